/**
 * Format-detecting reader factory
 *
 * Checks FASTQ first, then FASTA. FASTQ goes first because its check is the
 * stricter one.
 */

import { FormatDetectionError } from "../errors";
import type { SequenceFormat, SequenceIOOptions } from "../types";
import { withCodec } from "./abstract-codec";
import { FastaIO, validateFasta } from "./fasta";
import { FastqIO, validateFastq } from "./fastq";

/**
 * Detect the format of a file without opening a codec
 *
 * @returns "fastq", "fasta", or null when neither check accepts the file
 */
export async function detectSequenceFormat(
  filePath: string,
  options?: SequenceIOOptions
): Promise<SequenceFormat | null> {
  if ((await validateFastq(filePath, options)).valid) {
    return "fastq";
  }
  if ((await validateFasta(filePath, options)).valid) {
    return "fasta";
  }
  return null;
}

/**
 * Open a FastqIO or FastaIO reader, whichever format the file matches
 *
 * @throws {FormatDetectionError} When neither check accepts the file
 */
async function factory(filePath: string, options?: SequenceIOOptions): Promise<FastqIO | FastaIO> {
  const format = await detectSequenceFormat(filePath, options);
  if (format === null) {
    throw FormatDetectionError.forUnrecognizedFile(filePath);
  }
  return format === "fastq"
    ? FastqIO.open(filePath, "r", options)
    : FastaIO.open(filePath, "r", options);
}

/**
 * Open a reader with `factory`, run `fn` with it and close it on every
 * exit path
 */
async function use<T>(
  filePath: string,
  fn: (reader: FastqIO | FastaIO) => Promise<T>,
  options?: SequenceIOOptions
): Promise<T> {
  return withCodec(await factory(filePath, options), fn);
}

/**
 * Reader for files of unknown format
 *
 * @example
 * ```typescript
 * const reader = await SequenceFileReader.factory('unknown.gz');
 * try {
 *   for await (const record of reader) {
 *     console.log(record.id);
 *   }
 * } finally {
 *   await reader.close();
 * }
 * ```
 */
export const SequenceFileReader = {
  factory,
  use,
} as const;
