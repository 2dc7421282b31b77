/**
 * FASTQ reader/writer
 *
 * Reads strict four-line records (header, sequence, separator, quality) one
 * at a time from plain or gzip files, and writes records in the same layout.
 *
 * @example Reading
 * ```typescript
 * await FastqIO.use('reads.fastq.gz', 'r', async (reader) => {
 *   for await (const record of reader) {
 *     console.log(record.id, record.sequence.length);
 *   }
 * });
 * ```
 *
 * @example Writing
 * ```typescript
 * await FastqIO.use('out.fastq.gz', 'w', async (writer) => {
 *   await writer.write({ id: 'r1', sequence: 'ACGT', quality: 'IIII' });
 * });
 * ```
 */

import { ValidationError } from "../../errors";
import { countLines } from "../../io/line-counter";
import { resolveOptions } from "../../io/options";
import { TransparentStream } from "../../io/transparent-stream";
import type { FileMode, QualityOffset, SequenceIOOptions, SequenceRecord } from "../../types";
import { SequenceCodec, withCodec } from "../abstract-codec";
import { buildRecord, formatHeader, parseHeader } from "../primitives";
import { validateFastq } from "./detection";
import { inferQualityOffset } from "./quality";

export class FastqIO extends SequenceCodec {
  /**
   * Open a FASTQ file
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
  ): Promise<FastqIO> {
    const resolved = resolveOptions(options, "FASTQ");
    const stream = await TransparentStream.open(filePath, mode, options);
    return new FastqIO(stream, resolved);
  }

  /**
   * Open a FASTQ file, run `fn` with it and close it on every exit path
   */
  static async use<T>(
    filePath: string,
    mode: FileMode,
    fn: (codec: FastqIO) => Promise<T>,
    options?: SequenceIOOptions
  ): Promise<T> {
    return withCodec(await FastqIO.open(filePath, mode, options), fn);
  }

  /**
   * Read the next four-line record
   *
   * A quality string whose length differs from the sequence is passed
   * through and reported to `onWarning`.
   *
   * @returns The record, or null when the stream ends before a header
   * @throws {ParseError} When the header has no id or the record is truncated
   */
  async nextSeq(): Promise<SequenceRecord | null> {
    const headerLine = await this.readLine();
    if (headerLine === null) {
      return null;
    }

    const header = parseHeader(headerLine);
    if (header === null) {
      throw this.parseFailure(headerLine.trim(), this.currentLineNumber - 1);
    }

    const sequenceLine = await this.readLine();
    const separatorLine = sequenceLine === null ? null : await this.readLine();
    const qualityLine = separatorLine === null ? null : await this.readLine();
    if (sequenceLine === null || qualityLine === null) {
      throw this.parseFailure();
    }

    const sequence = sequenceLine.trim();
    const quality = qualityLine.trim();
    if (sequence.length !== quality.length) {
      this.options.onWarning(
        `Record '${header.id}' has ${sequence.length} residues but ${quality.length} quality scores`,
        this.currentLineNumber - 1
      );
    }

    return buildRecord(header, sequence, quality);
  }

  /**
   * Append one record
   *
   * @throws {ValidationError} When the record has no quality string
   * @throws {FileError} When the codec is not open for writing
   */
  async write(record: SequenceRecord): Promise<void> {
    await this.stream.write(`${this.formatRecord(record)}\n`);
    this.currentLineNumber += 4;
  }

  /**
   * Render a record as its four FASTQ lines
   *
   * @throws {ValidationError} When the record has no quality string
   */
  formatRecord(record: SequenceRecord): string {
    if (record.quality === undefined) {
      throw new ValidationError(
        `Record '${record.id}' has no quality string and cannot be written as FASTQ`,
        undefined,
        "Convert to FASTA or attach a quality string"
      );
    }
    return [formatHeader("@", record), record.sequence, "+", record.quality].join("\n");
  }

  protected getFormatName(): string {
    return "FASTQ";
  }

  protected getReaderName(): string {
    return "FastqIO";
  }

  // ============================================================================
  // FILE-LEVEL UTILITIES
  // ============================================================================

  /**
   * Whether the first records of a file look like FASTQ
   *
   * Never throws; see `validateFastq` for the reason of a rejection.
   */
  static async isValid(filePath: string, options?: SequenceIOOptions): Promise<boolean> {
    const result = await validateFastq(filePath, options);
    return result.valid;
  }

  /**
   * Infer the quality encoding offset of a file
   *
   * @returns 33 (Sanger, Illumina 1.8+), 64 (Solexa, Illumina before 1.8),
   *   or null when the file holds no countable quality
   * @throws {ParseError} When a record cannot be read
   * @throws {QualityError} When a quality code is above 126
   */
  static async qualOffset(
    filePath: string,
    options?: SequenceIOOptions
  ): Promise<QualityOffset | null> {
    return FastqIO.use(filePath, "r", (reader) => inferQualityOffset(reader), options);
  }

  /**
   * Number of records, assuming four lines per record
   */
  static async nbSeq(filePath: string, options?: SequenceIOOptions): Promise<number> {
    return Math.floor((await countLines(filePath, options)) / 4);
  }
}
