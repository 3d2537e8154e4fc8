/**
 * SEG-Y header codecs: byte-level fields, field maps, textual header, formats
 */

export * from "./binary";
export * from "./field-maps";
export * from "./formats";
export * from "./textual-header";
