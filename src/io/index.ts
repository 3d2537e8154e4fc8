/**
 * File access: platform bridge, generic file helpers, SEG-Y handle, reader and writer
 */

export { exists, FileReader, getSize, isDirectory, readByteRange, readToString } from "./file-reader";
export { copyFile, FileWriter, makeDirectory, writeByteRange, writeBytes, writeString } from "./file-writer";
export type { PlatformServices } from "./runtime";
export { getPlatform, runPlatform } from "./runtime";
export type { OpenOptions, OpenStrategy, TraceLayout } from "./segy-handle";
export { OPEN_STRATEGIES, resolveLayout, SegyHandle } from "./segy-handle";
export type { TraceHeaderTable } from "./segy-reader";
export { DEFAULT_TABLE_FIELDS, FieldStatsAccumulator, SegyFileReader } from "./segy-reader";
export type { ApplyEditsOptions, OutputOptions } from "./segy-writer";
export { outputTargetPath, SegyFileWriter } from "./segy-writer";
