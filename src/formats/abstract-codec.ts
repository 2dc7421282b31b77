/**
 * Abstract base codec with shared stream ownership and iteration
 *
 * FASTA and FASTQ codecs each own one TransparentStream, track the current
 * line number for diagnostics and expose the same pull interface. Parsing
 * and formatting stay with each format.
 */

import { CompressionError, ParseError } from "../errors";
import type { ResolvedIOOptions } from "../io/options";
import type { TransparentStream } from "../io/transparent-stream";
import type { FileMode, SequenceRecord } from "../types";

/**
 * Abstract codec base class
 *
 * Instances are created by the static `open()` of each format and must be
 * closed once, either explicitly or through the static `use()` helpers.
 */
export abstract class SequenceCodec implements AsyncIterable<SequenceRecord> {
  /** 1-based number of the line the codec will read next */
  protected currentLineNumber = 1;

  protected constructor(
    protected readonly stream: TransparentStream,
    protected readonly options: ResolvedIOOptions
  ) {}

  get filePath(): string {
    return this.stream.filePath;
  }

  get mode(): FileMode {
    return this.stream.mode;
  }

  get lineNumber(): number {
    return this.currentLineNumber;
  }

  get isClosed(): boolean {
    return this.stream.isClosed;
  }

  // ============================================================================
  // ABSTRACT METHODS (Each format implements its own way)
  // ============================================================================

  /**
   * Read the next record
   *
   * @returns The record, or null at end of stream
   * @throws {ParseError} When the content does not match the format
   */
  abstract nextSeq(): Promise<SequenceRecord | null>;

  /**
   * Append one record to the output
   */
  abstract write(record: SequenceRecord): Promise<void>;

  /**
   * Render one record as text, without the final line terminator
   */
  abstract formatRecord(record: SequenceRecord): string;

  /**
   * Format identifier for errors and warnings ("FASTA", "FASTQ")
   */
  protected abstract getFormatName(): string;

  /**
   * Codec name reported in parse errors
   */
  protected abstract getReaderName(): string;

  // ============================================================================
  // SHARED BEHAVIOUR
  // ============================================================================

  /**
   * Yield records until end of stream
   *
   * Iteration consumes the codec: a second loop picks up where the first one
   * stopped.
   */
  async *records(): AsyncGenerator<SequenceRecord, void, undefined> {
    for (let record = await this.nextSeq(); record !== null; record = await this.nextSeq()) {
      yield record;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<SequenceRecord> {
    return this.records();
  }

  /**
   * Release the underlying stream, finishing gzip output if any
   *
   * Safe to call more than once.
   */
  async close(): Promise<void> {
    await this.stream.close();
  }

  /**
   * Read one line and advance the line counter
   *
   * @throws {ParseError} When the compressed content is corrupt or truncated,
   *   with the CompressionError as its cause
   */
  protected async readLine(): Promise<string | null> {
    let line: string | null;
    try {
      line = await this.stream.readLine();
    } catch (error) {
      if (error instanceof CompressionError) {
        throw this.parseFailure(undefined, this.currentLineNumber, error);
      }
      throw error;
    }
    if (line !== null) {
      this.currentLineNumber++;
    }
    return line;
  }

  /**
   * Build the parse error for a line, the current one by default
   */
  protected parseFailure(
    content?: string,
    lineNumber = this.currentLineNumber,
    cause?: unknown
  ): ParseError {
    return ParseError.forLine(
      this.getFormatName(),
      this.getReaderName(),
      this.filePath,
      lineNumber,
      content,
      cause
    );
  }
}

/**
 * Run a callback with a codec and close it on every exit path
 */
export async function withCodec<C extends SequenceCodec, T>(
  codec: C,
  fn: (codec: C) => Promise<T>
): Promise<T> {
  try {
    return await fn(codec);
  } finally {
    await codec.close();
  }
}
