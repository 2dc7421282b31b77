/**
 * Central format module exports
 *
 * Provides a single import point for the FASTA and FASTQ codecs, their
 * checks and the format-detecting reader factory.
 *
 * @example
 * ```typescript
 * import { FastaIO, FastqIO, SequenceFileReader } from '../formats';
 * ```
 */

export { SequenceCodec, withCodec } from "./abstract-codec";
export { DETECTION_DEFAULTS } from "./constants";
export { detectSequenceFormat, SequenceFileReader } from "./factory";
export { FastaIO, type FastaRejection, validateFasta } from "./fasta";
export {
  ASCII_BOUNDARIES,
  FASTQ_DETECTION,
  FastqIO,
  type FastqRejection,
  inferQualityOffset,
  OFFSET_INFERENCE,
  QualityHistogram,
  validateFastq,
} from "./fastq";
export { buildRecord, createSequence, formatHeader, parseHeader } from "./primitives";
