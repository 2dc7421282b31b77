/**
 * Core type definitions for sequence records and I/O configuration
 */

import { type } from "arktype";

/**
 * A FASTA or FASTQ record
 *
 * Records are immutable: transforms such as reverse complement return a new
 * record. `quality` is present only for FASTQ records and is expected to have
 * the same length as `sequence`.
 */
export interface SequenceRecord {
  /** First whitespace-delimited token of the header line */
  readonly id: string;
  /** Remainder of the header line after the first whitespace run */
  readonly description?: string;
  /** Residue characters (nucleotide or amino acid, any case) */
  readonly sequence: string;
  /** ASCII-encoded quality string (FASTQ only) */
  readonly quality?: string;
}

export type SequenceFormat = "fasta" | "fastq";

/** Open mode of a codec: read, write (truncate) or append */
export type FileMode = "r" | "w" | "a";

export type CompressionFormat = "gzip" | "none";

/** Phred quality offsets: Sanger/Illumina 1.8+ (33), Solexa/Illumina <1.8 (64) */
export type QualityOffset = 33 | 64;

/** Complement alphabet used by reverse-complement transforms */
export type Alphabet = "dna" | "rna";

/**
 * Warning callback used for non-fatal diagnostics
 */
export type WarningHandler = (warning: string, lineNumber?: number) => void;

/**
 * Codec and stream configuration
 */
export interface SequenceIOOptions {
  /** Bytes requested per file read (default: 64KB) */
  readonly bufferSize?: number;
  /** Gzip level used when writing `.gz` files (default: 6) */
  readonly compressionLevel?: number;
  /** Compress output when the path ends in `.gz` (default: true) */
  readonly autoCompress?: boolean;
  /** Receives non-fatal diagnostics (default: console.warn) */
  readonly onWarning?: WarningHandler;
}

/**
 * Outcome of a format check
 *
 * Checks report why a file was rejected instead of throwing, so that callers
 * can tell "not this format" from "cannot be read".
 */
export type DetectionResult<TReason extends string> =
  | { readonly valid: true; readonly recordsChecked: number }
  | {
      readonly valid: false;
      readonly reason: TReason | "unreadable";
      /** 1-based index of the offending record (0 when nothing was read) */
      readonly record: number;
      readonly message: string;
    };

// =============================================================================
// ARKTYPE SCHEMAS
// =============================================================================

/**
 * Sequence record schema
 *
 * Enforces a non-empty, whitespace-free id and equal sequence/quality length
 * when a quality string is present.
 */
export const SequenceRecordSchema = type({
  id: "string>0",
  "description?": "string | undefined",
  sequence: "string",
  "quality?": "string | undefined",
}).narrow((record, ctx) => {
  if (/\s/.test(record.id)) {
    return ctx.reject({
      expected: "an id without whitespace",
      actual: JSON.stringify(record.id),
      path: ["id"],
    });
  }

  if (record.quality !== undefined && record.quality.length !== record.sequence.length) {
    return ctx.reject({
      expected: `a quality string of length ${record.sequence.length}`,
      actual: `length ${record.quality.length}`,
      path: ["quality"],
    });
  }

  return true;
});

/**
 * File path schema: non-empty and free of null bytes
 */
export const FilePathSchema = type("string>0").narrow((path, ctx) => {
  if (path.includes("\0")) {
    return ctx.reject({
      expected: "a path without null characters",
      actual: JSON.stringify(path),
    });
  }
  return true;
});

/**
 * I/O options schema
 */
export const SequenceIOOptionsSchema = type({
  "bufferSize?": "number>=1024",
  "compressionLevel?": "number>=0",
  "autoCompress?": "boolean",
  "onWarning?": "unknown",
}).narrow((options, ctx) => {
  if (options.bufferSize !== undefined && options.bufferSize > 1_048_576) {
    return ctx.reject({
      expected: "bufferSize <= 1MB",
      actual: `${options.bufferSize} bytes`,
      path: ["bufferSize"],
    });
  }

  if (
    options.compressionLevel !== undefined &&
    (options.compressionLevel > 9 || !Number.isInteger(options.compressionLevel))
  ) {
    return ctx.reject({
      expected: "an integer gzip level between 0 and 9",
      actual: `${options.compressionLevel}`,
      path: ["compressionLevel"],
    });
  }

  if (options.onWarning !== undefined && typeof options.onWarning !== "function") {
    return ctx.reject({
      expected: "a function",
      actual: typeof options.onWarning,
      path: ["onWarning"],
    });
  }

  return true;
});
