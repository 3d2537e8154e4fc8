/**
 * Pipeline orchestrator
 *
 * Read → Pre-validate → Prepare output → Apply edits → Post-validate, for
 * one file (`apply`) or many (`runBatch`). Progress, stage and log events
 * go to registered callbacks. One engine runs one job at a time; callbacks
 * are replaced, not queued.
 */

import { basename } from "node:path";
import { Effect } from "effect";
import { BINARY_FIELD_MAP } from "../codec/field-maps";
import { ChangeLogThrottle } from "../editors/change-policy";
import { TraceHeaderEditor } from "../editors/trace-editor";
import { ConfigError, describeError } from "../errors";
import { SegyFileReader } from "../io/segy-reader";
import { SegyFileWriter } from "../io/segy-writer";
import { configureLogging, logSync } from "../logging";
import type {
  BatchResult,
  ChangeRecord,
  DryRunResult,
  EditJob,
  LogCallback,
  ProgressCallback,
  SegyFileInfo,
  StageCallback,
  ValidationResult,
} from "../types";
import { PipelineState } from "../types";
import { SegyValidator, withChecks } from "../validation/validator";
import type { EngineConfig, EngineConfigInput } from "./config";
import { mergeEngineConfig } from "./config";

export const PIPELINE_STAGES = [
  "Read file",
  "Pre-validate",
  "Prepare output",
  "Apply edits",
  "Post-validate",
] as const;

export const Stage = {
  READ: 0,
  PRE_VALIDATE: 1,
  PREPARE_OUTPUT: 2,
  APPLY_EDITS: 3,
  POST_VALIDATE: 4,
} as const;

export type Stage = (typeof Stage)[keyof typeof Stage];

export interface EngineCallbacks {
  readonly onStage?: StageCallback;
  readonly onProgress?: ProgressCallback;
  readonly onLog?: LogCallback;
}

export interface ApplyResult {
  readonly outputPath: string;
  readonly changes: readonly ChangeRecord[];
  readonly postValidation: ValidationResult;
}

export class SegyEngine {
  readonly config: EngineConfig;
  readonly reader = new SegyFileReader();
  readonly writer = new SegyFileWriter();
  readonly validator: SegyValidator;

  private readonly traceEditor = new TraceHeaderEditor();
  private callbacks: EngineCallbacks = {};
  private cancelled = false;
  private currentState: PipelineState = PipelineState.IDLE;
  private definedJob: EditJob | undefined;

  /**
   * @throws {ConfigError} If the configuration is invalid
   */
  constructor(config: EngineConfigInput = {}) {
    this.config = mergeEngineConfig(config);
    // Only an explicit level overrides SEGY_LOG_LEVEL
    if (config.logLevel !== undefined) configureLogging(config.logLevel);
    this.validator = new SegyValidator({
      coordinateBounds: this.config.coordinateBounds,
      checkStructure: this.config.checks.structure,
      checkBinaryHeader: this.config.checks.binaryHeader,
      checkTraceHeader: this.config.checks.traceHeader,
      checkCoordinateRange: this.config.checks.coordinateRange,
    });
  }

  setCallbacks(callbacks: EngineCallbacks): void {
    this.callbacks = callbacks;
  }

  /**
   * Stop a running batch before its next file; the current file completes
   */
  cancel(): void {
    this.cancelled = true;
  }

  get state(): PipelineState {
    return this.currentState;
  }

  get job(): EditJob | undefined {
    return this.definedJob;
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  /**
   * Stage 0: read a file's metadata
   */
  async loadFile(path: string): Promise<SegyFileInfo> {
    this.emitStage(Stage.READ);
    this.log(`Reading file: ${basename(path)}`);
    const info = await this.reader.open(path);
    this.currentState = PipelineState.FILES_LOADED;
    this.log(`Loaded: ${info.traceCount} traces, ${info.samplesPerTrace} samples`);
    return info;
  }

  /**
   * Stage 1: pre-edit validation
   *
   * A FAIL leaves the engine in FILES_LOADED.
   */
  validate(info: SegyFileInfo): ValidationResult {
    this.emitStage(Stage.PRE_VALIDATE);
    this.log("Running pre-validation...");
    const result = this.validator.validate(info);

    if (result.overallStatus === "FAIL") {
      this.currentState = PipelineState.FILES_LOADED;
      this.log(`Validation failed: ${result.checks.filter((c) => c.status === "FAIL").length} checks`);
    } else {
      this.currentState = PipelineState.VALIDATED;
      this.log(`Validation complete: ${result.overallStatus}`);
    }
    return result;
  }

  /**
   * Check a job statically and keep it for later `apply`/`runBatch` calls
   *
   * @returns Problems found; the job is only kept when there are none
   */
  async defineEdits(job: EditJob): Promise<string[]> {
    const problems: string[] = [];

    for (const edit of job.ebcdicEdits) {
      if (edit.mode === "template" && edit.templateText === undefined && (edit.templatePath ?? "") === "") {
        problems.push("Textual header template edit has no template path");
      }
    }
    for (const edit of job.binaryEdits) {
      if (BINARY_FIELD_MAP.tryResolve(edit) === undefined) {
        problems.push(`Cannot resolve binary header field: name='${edit.fieldName ?? ""}', offset=${edit.byteOffset ?? "none"}`);
      }
    }
    for (const edit of job.traceEdits) {
      const problem = await this.traceEditor.validateEdit(edit);
      if (problem !== undefined) problems.push(`${this.traceEditor.getDisplayName(edit)}: ${problem}`);
    }

    if (problems.length === 0) {
      this.definedJob = job;
      this.currentState = PipelineState.EDITS_DEFINED;
      this.log(
        `Edits defined: ${job.ebcdicEdits.length} textual, ${job.binaryEdits.length} binary, ${job.traceEdits.length} trace`
      );
    } else {
      for (const problem of problems) this.log(`Edit rejected: ${problem}`);
    }
    return problems;
  }

  /**
   * Dry run: what the job would change, without touching any file
   */
  async preview(path: string, job?: EditJob): Promise<DryRunResult> {
    this.log("Generating dry-run preview...");
    return this.writer.dryRun(path, this.resolveJob(job), this.config.previewTraces);
  }

  /**
   * Stages 2-4: prepare output, apply edits, post-validate the written file
   *
   * When the job edits the binary header, post-validation also warns about
   * binary fields that changed without being edited; `before` is read from
   * the source when not supplied.
   */
  async apply(path: string, job?: EditJob, before?: SegyFileInfo): Promise<ApplyResult> {
    const edits = this.resolveJob(job);
    const filename = basename(path);
    const editedBinaryFields = new Set(
      edits.binaryEdits.flatMap((edit) => {
        const field = BINARY_FIELD_MAP.tryResolve(edit);
        return field === undefined ? [] : [field.name];
      })
    );
    const snapshot =
      editedBinaryFields.size > 0 ? (before ?? (await this.reader.open(path))) : undefined;

    this.emitStage(Stage.PREPARE_OUTPUT);
    this.log("Preparing output file...");
    const outputPath = await this.writer.prepareOutput(path, {
      outputMode: this.config.outputMode,
      outputDir: this.config.outputDir,
      backupSuffix: this.config.backupSuffix,
    });
    this.log(`Output path: ${outputPath}`);

    this.emitStage(Stage.APPLY_EDITS);
    this.log("Applying edits...");
    const throttle = new ChangeLogThrottle();
    const changes = await this.writer.applyEdits(outputPath, edits, {
      filename,
      onProgress: this.callbacks.onProgress,
      onChange: (change) => {
        const decision = throttle.next();
        if (decision === "detail") {
          this.log(`  ${change.fieldType}/${change.fieldName}: ${change.beforeValue} -> ${change.afterValue}`);
        } else if (decision === "summarize") {
          this.log("  ... (further changes are summarized on completion)");
        }
      },
    });
    this.log(`Edits complete: ${changes.length} changes`);

    this.emitStage(Stage.POST_VALIDATE);
    this.log("Running post-validation...");
    const after = await this.reader.open(outputPath);
    const validation = this.validator.validate(after);
    const postValidation =
      snapshot === undefined
        ? validation
        : withChecks(validation, this.validator.detectDrift(snapshot, after, editedBinaryFields));
    this.log(`Post-validation: ${postValidation.overallStatus}`);

    this.currentState = PipelineState.APPLIED;
    return { outputPath, changes, postValidation };
  }

  // ---------------------------------------------------------------------------
  // Batch
  // ---------------------------------------------------------------------------

  /**
   * Run the whole pipeline over several files
   *
   * A file failing pre-validation is SKIPPED; an error on one file is
   * recorded as FAILURE and the batch moves on. With `dryRun` configured,
   * files are previewed instead of written.
   */
  async runBatch(paths: readonly string[], job?: EditJob): Promise<BatchResult[]> {
    const edits = this.resolveJob(job);
    this.cancelled = false;
    const results: BatchResult[] = [];
    const total = paths.length;

    for (const [i, path] of paths.entries()) {
      const filename = basename(path);
      if (this.cancelled) {
        results.push({ filename, status: "SKIPPED", message: "Cancelled", changes: [], durationSeconds: 0 });
        continue;
      }

      this.callbacks.onProgress?.(i, total);
      const started = Date.now();
      const elapsed = (): number => (Date.now() - started) / 1000;

      try {
        const info = await this.loadFile(path);
        const validationBefore = this.validate(info);
        if (validationBefore.overallStatus === "FAIL") {
          results.push({
            filename,
            status: "SKIPPED",
            message: "Skipped: pre-validation failed",
            changes: [],
            validationBefore,
            durationSeconds: elapsed(),
          });
          continue;
        }

        if (this.config.dryRun) {
          const preview = await this.preview(path, edits);
          results.push({
            filename,
            status: "SUCCESS",
            message:
              `Dry run: ${preview.ebcdicPreview.length} textual, ${preview.binaryPreview.length} binary, ` +
              `${preview.tracePreview.length} trace previews`,
            changes: [],
            validationBefore,
            durationSeconds: elapsed(),
          });
          continue;
        }

        const { changes, postValidation } = await this.apply(path, edits, info);
        results.push({
          filename,
          status: "SUCCESS",
          message: `${changes.length} changes applied`,
          changes,
          validationBefore,
          validationAfter: postValidation,
          durationSeconds: elapsed(),
        });
      } catch (error) {
        const message = describeError(error);
        this.log(`Failed: ${filename}: ${message}`);
        results.push({ filename, status: "FAILURE", message, changes: [], durationSeconds: elapsed() });
      }
    }

    this.callbacks.onProgress?.(total, total);
    return results;
  }

  // ---------------------------------------------------------------------------
  // Private
  // ---------------------------------------------------------------------------

  private resolveJob(job: EditJob | undefined): EditJob {
    const resolved = job ?? this.definedJob;
    if (resolved === undefined) {
      throw new ConfigError("No edit job given and none defined");
    }
    return resolved;
  }

  private emitStage(stage: Stage): void {
    this.callbacks.onStage?.(stage, PIPELINE_STAGES[stage]);
  }

  private log(message: string): void {
    logSync(Effect.logInfo(message));
    this.callbacks.onLog?.(message);
  }
}
