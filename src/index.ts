/**
 * fastx-io - streaming FASTA and FASTQ reading and writing
 *
 * Format detection, transparent gzip, quality offset inference and
 * reverse complements for sequence files.
 */

// Compression infrastructure
export { CompressionDetector, GzipDeflater, GzipInflater, type GzipOptions } from './compression';
// Error types
export {
  CompressionError,
  FastxError,
  FileError,
  FormatDetectionError,
  InvalidSymbolError,
  ParseError,
  QualityError,
  SequenceError,
  ValidationError,
} from './errors';
// Codecs, checks and the reader factory
export {
  createSequence,
  DETECTION_DEFAULTS,
  detectSequenceFormat,
  FastaIO,
  type FastaRejection,
  FastqIO,
  type FastqRejection,
  inferQualityOffset,
  QualityHistogram,
  SequenceCodec,
  SequenceFileReader,
  validateFasta,
  validateFastq,
} from './formats';
// File I/O infrastructure
export { isGzip } from './io/file-reader';
export { countLines, countMatchingLines } from './io/line-counter';
export { DEFAULT_IO_OPTIONS, type ResolvedIOOptions, resolveOptions } from './io/options';
export { TransparentStream } from './io/transparent-stream';
// Sequence transforms
export {
  DNA_COMPLEMENT,
  dnaReverseComplement,
  RNA_COMPLEMENT,
  reverseComplementSequence,
  rnaReverseComplement,
} from './operations/core/sequence-manipulation';
// Core types
export type {
  Alphabet,
  CompressionFormat,
  DetectionResult,
  FileMode,
  QualityOffset,
  SequenceFormat,
  SequenceIOOptions,
  SequenceRecord,
  WarningHandler,
} from './types';

export const VERSION = '0.1.0';
export const SUPPORTED_FORMATS = ['fasta', 'fastq'] as const;
export const SUPPORTED_COMPRESSIONS = ['gzip'] as const;
