/**
 * Sample data format codes (binary header bytes 25-26)
 */

/** Bytes per sample for each supported format code */
export const FORMAT_BYTES_PER_SAMPLE: Readonly<Record<number, number>> = {
  1: 4,
  2: 4,
  3: 2,
  5: 4,
  6: 8,
  8: 1,
};

export const FORMAT_NAMES: Readonly<Record<number, string>> = {
  1: "IBM Float (4-byte)",
  2: "4-byte Integer",
  3: "2-byte Integer",
  5: "IEEE Float (4-byte)",
  6: "IEEE Double (8-byte)",
  8: "1-byte Integer",
};

/** Assumed sample width when the format code is not recognised */
export const DEFAULT_BYTES_PER_SAMPLE = 4;

export function isKnownFormat(code: number): boolean {
  return Object.prototype.hasOwnProperty.call(FORMAT_BYTES_PER_SAMPLE, code);
}

export function bytesPerSample(code: number): number {
  return FORMAT_BYTES_PER_SAMPLE[code] ?? DEFAULT_BYTES_PER_SAMPLE;
}

export function formatName(code: number): string {
  return FORMAT_NAMES[code] ?? `Unknown (${code})`;
}

/**
 * Expected total file size; 0 when the sample geometry is unknown
 */
export function expectedFileSize(traceCount: number, samplesPerTrace: number, sampleBytes: number): number {
  if (samplesPerTrace <= 0 || sampleBytes <= 0) return 0;
  return 3200 + 400 + traceCount * (240 + samplesPerTrace * sampleBytes);
}
