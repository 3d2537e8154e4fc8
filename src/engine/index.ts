/**
 * Pipeline orchestration and its configuration
 */

export type { ConfigFile, EditDefinition, EngineConfig, EngineConfigInput } from "./config";
export {
  buildEditJob,
  ConfigFileSchema,
  CoordinateBoundsSchema,
  DEFAULT_ENGINE_CONFIG,
  EditDefinitionSchema,
  EngineConfigSchema,
  loadEngineConfig,
  mergeEngineConfig,
  parseConfigFile,
  saveEngineConfig,
} from "./config";
export type { ApplyResult, EngineCallbacks } from "./engine";
export { PIPELINE_STAGES, SegyEngine, Stage } from "./engine";
