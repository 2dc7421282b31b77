/**
 * FASTA reader/writer
 *
 * Records may span any number of sequence lines; the reader keeps the next
 * header as a one-line lookahead so that each record ends where the next
 * one starts. Records are written with the sequence on a single line.
 */

import { countMatchingLines } from "../io/line-counter";
import { resolveOptions } from "../io/options";
import { TransparentStream } from "../io/transparent-stream";
import type { DetectionResult, FileMode, SequenceIOOptions, SequenceRecord } from "../types";
import { SequenceCodec, withCodec } from "./abstract-codec";
import { DETECTION_DEFAULTS } from "./constants";
import { buildRecord, formatHeader, parseHeader } from "./primitives";

/**
 * Why a file was rejected as FASTA
 */
export type FastaRejection = "missing-header" | "header-without-sequence";

export class FastaIO extends SequenceCodec {
  private pendingHeader: string | null = null;
  private pendingHeaderLine = 1;
  private started = false;
  private endOfStream = false;

  /**
   * Open a FASTA file
   *
   * @param filePath - File to read or write; gzip is handled transparently
   * @param mode - "r" to read, "w" to truncate and write, "a" to append
   * @throws {FileError} When the file cannot be opened
   * @throws {ValidationError} When an option is out of range
   */
  static async open(
    filePath: string,
    mode: FileMode = "r",
    options: SequenceIOOptions = {}
  ): Promise<FastaIO> {
    const resolved = resolveOptions(options, "FASTA");
    const stream = await TransparentStream.open(filePath, mode, options);
    return new FastaIO(stream, resolved);
  }

  /**
   * Open a FASTA file, run `fn` with it and close it on every exit path
   */
  static async use<T>(
    filePath: string,
    mode: FileMode,
    fn: (codec: FastaIO) => Promise<T>,
    options?: SequenceIOOptions
  ): Promise<T> {
    return withCodec(await FastaIO.open(filePath, mode, options), fn);
  }

  /**
   * Read the next record
   *
   * Sequence lines are trimmed and concatenated up to the next `>` line or
   * the end of the stream. An empty file yields no record.
   *
   * A first line that is not a `>` header is rejected instead of being read
   * as a header with its first character dropped.
   *
   * @returns The record, or null at end of stream
   * @throws {ParseError} When the pending header does not start with `>` or has no id
   */
  async nextSeq(): Promise<SequenceRecord | null> {
    if (!this.started) {
      this.started = true;
      this.pendingHeaderLine = this.currentLineNumber;
      this.pendingHeader = await this.readLine();
    }

    const headerLine = this.pendingHeader;
    if (this.endOfStream || headerLine === null) {
      this.endOfStream = true;
      return null;
    }

    const header = headerLine.startsWith(">") ? parseHeader(headerLine) : null;
    if (header === null) {
      throw this.parseFailure(headerLine.trim(), this.pendingHeaderLine);
    }

    let sequence = "";
    for (;;) {
      const lineNumber = this.currentLineNumber;
      const line = await this.readLine();
      if (line === null) {
        this.pendingHeader = null;
        this.endOfStream = true;
        break;
      }
      if (line.startsWith(">")) {
        this.pendingHeader = line;
        this.pendingHeaderLine = lineNumber;
        break;
      }
      sequence += line.trim();
    }

    return buildRecord(header, sequence);
  }

  /**
   * Append one record; any quality string is dropped
   *
   * @throws {FileError} When the codec is not open for writing
   */
  async write(record: SequenceRecord): Promise<void> {
    await this.stream.write(`${this.formatRecord(record)}\n`);
    this.currentLineNumber += 2;
  }

  /**
   * Render a record as a header line and a single sequence line
   */
  formatRecord(record: SequenceRecord): string {
    return `${formatHeader(">", record)}\n${record.sequence}`;
  }

  protected getFormatName(): string {
    return "FASTA";
  }

  protected getReaderName(): string {
    return "FastaIO";
  }

  // ============================================================================
  // FILE-LEVEL UTILITIES
  // ============================================================================

  /**
   * Whether the first records of a file look like FASTA
   *
   * Never throws; see `validateFasta` for the reason of a rejection.
   */
  static async isValid(filePath: string, options?: SequenceIOOptions): Promise<boolean> {
    const result = await validateFasta(filePath, options);
    return result.valid;
  }

  /**
   * Number of records, counted as lines starting with `>`
   */
  static async nbSeq(filePath: string, options?: SequenceIOOptions): Promise<number> {
    return countMatchingLines(filePath, (line) => line.startsWith(">"), options);
  }
}

/**
 * Examine a file as FASTA up to its tenth header
 *
 * The first line must be a header and no header may directly follow
 * another. An empty file, or one ending on a header, is accepted. The check
 * never throws: read failures are reported as the "unreadable" reason.
 */
export async function validateFasta(
  filePath: string,
  options?: SequenceIOOptions
): Promise<DetectionResult<FastaRejection>> {
  let stream: TransparentStream;
  try {
    stream = await TransparentStream.open(filePath, "r", options);
  } catch (error) {
    return unreadable(0, error);
  }

  let headers = 0;
  let previousIsHeader = false;
  try {
    while (headers < DETECTION_DEFAULTS.MAX_RECORDS) {
      const line = await stream.readLine();
      if (line === null) {
        break;
      }

      if (line.startsWith(">")) {
        if (previousIsHeader) {
          return {
            valid: false,
            reason: "header-without-sequence",
            record: headers,
            message: `The fasta file "${filePath}" contains an header without sequence.`,
          };
        }
        previousIsHeader = true;
        headers++;
      } else {
        if (headers === 0) {
          return {
            valid: false,
            reason: "missing-header",
            record: 0,
            message: `The fasta file "${filePath}" does not start with ">".`,
          };
        }
        previousIsHeader = false;
      }
    }
  } catch (error) {
    return unreadable(headers, error);
  } finally {
    await stream.close();
  }

  return { valid: true, recordsChecked: headers };
}

function unreadable(record: number, error: unknown): DetectionResult<FastaRejection> {
  return {
    valid: false,
    reason: "unreadable",
    record,
    message: error instanceof Error ? error.message : String(error),
  };
}
