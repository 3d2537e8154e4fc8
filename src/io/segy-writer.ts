/**
 * SEG-Y output preparation and edit application
 *
 * Edits always land on a working file chosen by `prepareOutput`: a copy in
 * a separate folder, or the original itself after a backup copy has been
 * written next to it.
 */

import { basename, join, resolve } from "node:path";
import { Effect } from "effect";
import { decodeTextualHeader, detectEncoding } from "../codec/textual-header";
import { BinaryHeaderEditor } from "../editors/binary-editor";
import type { ChangeRecordPolicy } from "../editors/change-policy";
import { EbcdicEditor } from "../editors/ebcdic-editor";
import { DEFAULT_PREVIEW_TRACES, TraceHeaderEditor } from "../editors/trace-editor";
import { logSync } from "../logging";
import type {
  BinaryPreview,
  ChangeCallback,
  ChangeRecord,
  DryRunResult,
  EbcdicEdit,
  EbcdicPreview,
  EditJob,
  OutputMode,
  ProgressCallback,
  TracePreviewRow,
} from "../types";
import { TEXTUAL_HEADER_SIZE } from "../types";
import { exists, readByteRange } from "./file-reader";
import { copyFile, makeDirectory, writeByteRange } from "./file-writer";
import { SegyHandle } from "./segy-handle";

export interface OutputOptions {
  readonly outputMode?: OutputMode;
  readonly outputDir?: string;
  readonly backupSuffix?: string;
}

export interface ApplyEditsOptions {
  /** Name used in change records; defaults to the working file's name */
  readonly filename?: string;
  readonly onChange?: ChangeCallback;
  readonly onProgress?: ProgressCallback;
  readonly policy?: ChangeRecordPolicy;
}

const DEFAULT_OUTPUT_DIR = "./output";
const DEFAULT_BACKUP_SUFFIX = ".bak";

/**
 * Path a source file is copied to under an output mode
 */
export function outputTargetPath(source: string, options: OutputOptions = {}): string {
  const mode = options.outputMode ?? "separate_folder";
  return mode === "separate_folder"
    ? join(options.outputDir ?? DEFAULT_OUTPUT_DIR, basename(source))
    : `${source}${options.backupSuffix ?? DEFAULT_BACKUP_SUFFIX}`;
}

export class SegyFileWriter {
  private readonly ebcdicEditor = new EbcdicEditor();
  private readonly binaryEditor = new BinaryHeaderEditor();
  private readonly traceEditor = new TraceHeaderEditor();

  /**
   * Create the copy or backup and return the path to edit
   *
   * `separate_folder` returns the copy; `in_place_backup` returns the
   * original path after writing `<source><suffix>`.
   *
   * @throws {FileError} If the directory or copy cannot be created
   */
  async prepareOutput(source: string, options: OutputOptions = {}): Promise<string> {
    const mode = options.outputMode ?? "separate_folder";
    const target = outputTargetPath(source, options);

    if (mode === "separate_folder") {
      await makeDirectory(options.outputDir ?? DEFAULT_OUTPUT_DIR);
      if (resolve(target) !== resolve(source)) {
        await copyFile(source, target);
      }
      logSync(Effect.logInfo(`Output copy: ${target}`).pipe(Effect.annotateLogs("file", basename(source))));
      return target;
    }

    await copyFile(source, target);
    logSync(Effect.logInfo(`Backup created: ${target}`).pipe(Effect.annotateLogs("file", basename(source))));
    return source;
  }

  /**
   * Apply a job to a prepared working file
   *
   * Textual edits go first through raw byte I/O; binary then trace edits go
   * through one read-write handle.
   *
   * @throws {SegyOpenError} If the working file cannot be opened
   * @throws {TraceEditError} If any trace of a trace edit failed
   */
  async applyEdits(outputPath: string, job: EditJob, options: ApplyEditsOptions = {}): Promise<ChangeRecord[]> {
    const filename = options.filename !== undefined && options.filename !== "" ? options.filename : basename(outputPath);
    const all: ChangeRecord[] = [];
    const emit = (changes: readonly ChangeRecord[]): void => {
      all.push(...changes);
      if (options.onChange !== undefined) {
        for (const change of changes) options.onChange(change);
      }
    };

    if (job.ebcdicEdits.length > 0) {
      emit(await this.applyEbcdicEdits(outputPath, job.ebcdicEdits, filename));
    }

    if (job.binaryEdits.length > 0 || job.traceEdits.length > 0) {
      const handle = await SegyHandle.open(outputPath, { writable: true });
      try {
        for (const edit of job.binaryEdits) {
          emit([await this.binaryEditor.applyEdit(handle, edit, filename)]);
        }
        for (const edit of job.traceEdits) {
          emit(
            await this.traceEditor.applyEdit(handle, edit, {
              filename,
              onProgress: options.onProgress,
              policy: options.policy,
            })
          );
        }
      } finally {
        await handle.close();
      }
    }

    logSync(Effect.logInfo(`Applied edits: ${all.length} change records`).pipe(Effect.annotateLogs("file", filename)));
    return all;
  }

  /**
   * Preview every edit of a job against the source file; nothing is written
   */
  async dryRun(sourcePath: string, job: EditJob, maxTraces = DEFAULT_PREVIEW_TRACES): Promise<DryRunResult> {
    const ebcdicPreview: EbcdicPreview[] = [];
    const binaryPreview: BinaryPreview[] = [];
    const tracePreview: TracePreviewRow[][] = [];

    if (job.ebcdicEdits.length > 0) {
      const currentLines = decodeTextualHeader(await readByteRange(sourcePath, 0, TEXTUAL_HEADER_SIZE));
      for (const edit of job.ebcdicEdits) {
        const loaded = await this.ebcdicEditor.loadTemplate(edit);
        ebcdicPreview.push(this.ebcdicEditor.previewChanges(currentLines, loaded));
      }
    }

    if (job.binaryEdits.length > 0 || job.traceEdits.length > 0) {
      const handle = await SegyHandle.open(sourcePath);
      try {
        if (job.binaryEdits.length > 0) {
          const current = await handle.readBinaryValues();
          for (const edit of job.binaryEdits) {
            binaryPreview.push(this.binaryEditor.previewEdit(current, edit));
          }
        }
        for (const edit of job.traceEdits) {
          tracePreview.push(await this.traceEditor.previewEdit(handle, edit, maxTraces));
        }
      } finally {
        await handle.close();
      }
    }

    return { ebcdicPreview, binaryPreview, tracePreview };
  }

  /**
   * Copies or backups that already exist and would be overwritten
   *
   * Advisory only; `prepareOutput` overwrites regardless.
   */
  async checkOutputConflicts(sources: readonly string[], options: OutputOptions = {}): Promise<string[]> {
    const conflicts: string[] = [];
    for (const source of sources) {
      const target = outputTargetPath(source, options);
      if (await exists(target)) conflicts.push(target);
    }
    return conflicts;
  }

  private async applyEbcdicEdits(path: string, edits: readonly EbcdicEdit[], filename: string): Promise<ChangeRecord[]> {
    const raw = await readByteRange(path, 0, TEXTUAL_HEADER_SIZE);
    const encoding = detectEncoding(raw);
    const current = decodeTextualHeader(raw, encoding);

    let next = current;
    for (const edit of edits) {
      next = this.ebcdicEditor.applyEdit(next, await this.ebcdicEditor.loadTemplate(edit));
    }

    const changes = this.ebcdicEditor.diff(current, next, filename);
    await writeByteRange(path, 0, this.ebcdicEditor.encode(next, encoding));
    return changes;
  }
}
