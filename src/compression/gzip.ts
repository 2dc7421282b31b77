/**
 * Incremental gzip compression and decompression
 *
 * Thin wrappers over fflate's streaming `Gzip` and `Gunzip` classes with a
 * pull-friendly interface: push a chunk, get back whatever output it
 * produced. Decompression accepts multi-member files (e.g. the output of
 * appending to a `.gz` file).
 */

import { Gunzip, Gzip } from "fflate";
import { CompressionError } from "../errors";

/**
 * Options for gzip output
 */
export interface GzipOptions {
  /** Compression level, 0 (store) to 9 (smallest) */
  readonly level?: number;
}

type DeflateLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;

const DEFLATE_LEVELS: readonly DeflateLevel[] = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9];

function toDeflateLevel(level: number): DeflateLevel {
  const match = DEFLATE_LEVELS.find((candidate) => candidate === level);
  if (match === undefined) {
    throw new CompressionError(`Invalid gzip level: ${level}`, "gzip", "validate");
  }
  return match;
}

/**
 * Streaming gzip decompressor
 *
 * @example
 * ```typescript
 * const inflater = new GzipInflater();
 * const text = inflater.push(chunk);          // zero or more output chunks
 * const tail = inflater.finish();             // flush at end of input
 * ```
 */
export class GzipInflater {
  private readonly gunzip: Gunzip;
  private output: Uint8Array[] = [];
  private bytesProcessed = 0;

  constructor() {
    this.gunzip = new Gunzip((data) => {
      this.output.push(data);
    });
  }

  /**
   * Feed compressed bytes and collect the decompressed output
   *
   * @throws {CompressionError} If the data is not valid gzip
   */
  push(chunk: Uint8Array): Uint8Array[] {
    this.bytesProcessed += chunk.length;
    return this.run(chunk, false);
  }

  /**
   * Signal end of input and collect the remaining output
   *
   * @throws {CompressionError} If the gzip stream is truncated
   */
  finish(): Uint8Array[] {
    return this.run(new Uint8Array(0), true);
  }

  private run(chunk: Uint8Array, final: boolean): Uint8Array[] {
    try {
      this.gunzip.push(chunk, final);
    } catch (error) {
      throw CompressionError.fromSystemError("gzip", "decompress", error, this.bytesProcessed);
    }
    const produced = this.output;
    this.output = [];
    return produced;
  }
}

/**
 * Streaming gzip compressor
 */
export class GzipDeflater {
  private readonly gzip: Gzip;
  private output: Uint8Array[] = [];

  constructor(options: GzipOptions = {}) {
    this.gzip = new Gzip({ level: toDeflateLevel(options.level ?? 6) }, (data) => {
      this.output.push(data);
    });
  }

  /**
   * Compress a chunk; output may be buffered until later pushes
   */
  push(chunk: Uint8Array): Uint8Array[] {
    return this.run(chunk, false);
  }

  /**
   * Flush the remaining output and the gzip trailer
   */
  finish(): Uint8Array[] {
    return this.run(new Uint8Array(0), true);
  }

  private run(chunk: Uint8Array, final: boolean): Uint8Array[] {
    try {
      this.gzip.push(chunk, final);
    } catch (error) {
      throw CompressionError.fromSystemError("gzip", "compress", error);
    }
    const produced = this.output;
    this.output = [];
    return produced;
  }
}
