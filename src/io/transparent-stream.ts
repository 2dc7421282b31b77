/**
 * Line-oriented file stream with transparent gzip handling
 *
 * The stream owns one Effect Platform file handle, kept alive in its own
 * Scope until `close()`. In read mode gzip is detected from the magic bytes
 * of the file; in write and append mode it is chosen from the `.gz` suffix.
 *
 * @example
 * ```typescript
 * const stream = await TransparentStream.open('reads.fastq.gz', 'r');
 * try {
 *   let line = await stream.readLine();
 *   while (line !== null) {
 *     line = await stream.readLine();
 *   }
 * } finally {
 *   await stream.close();
 * }
 * ```
 */

import { FileSystem } from "@effect/platform";
import { type } from "arktype";
import { Effect, Exit, Option, Scope } from "effect";
import { CompressionDetector, GzipDeflater, GzipInflater } from "../compression";
import { FileError } from "../errors";
import type { CompressionFormat, FileMode, SequenceIOOptions } from "../types";
import { FilePathSchema } from "../types";
import { type ResolvedIOOptions, resolveOptions } from "./options";
import { getPlatform } from "./runtime";

const NEWLINE = 0x0a;

const EMPTY = new Uint8Array(0);

/**
 * Validate a file path, reporting failures as FileError
 */
export function validatePath(path: string, operation: FileError["operation"] = "open"): string {
  const validation = FilePathSchema(path);
  if (validation instanceof type.errors) {
    throw new FileError(`Invalid file path: ${validation.summary}`, path, operation);
  }
  return validation;
}

/**
 * Open a file handle inside a caller-owned scope
 */
async function openHandle(
  path: string,
  mode: FileMode,
  scope: Scope.CloseableScope
): Promise<FileSystem.File> {
  const program = Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    return yield* fs.open(path, { flag: mode });
  });

  return Effect.runPromise(program.pipe(Scope.extend(scope), Effect.provide(getPlatform())));
}

export class TransparentStream {
  /** Decompressed chunks not yet fully consumed; `offset` indexes the first */
  private chunks: Uint8Array[] = [];
  private offset = 0;
  /** Chunks already searched for a newline without success */
  private scannedChunks = 0;
  private sourceDone = false;
  private position = 0;
  private closed = false;
  private readonly decoder = new TextDecoder("utf-8");
  private readonly encoder = new TextEncoder();

  private constructor(
    readonly filePath: string,
    readonly mode: FileMode,
    readonly compression: CompressionFormat,
    private readonly file: FileSystem.File,
    private readonly scope: Scope.CloseableScope,
    private readonly options: ResolvedIOOptions,
    private readonly inflater: GzipInflater | null,
    private readonly deflater: GzipDeflater | null
  ) {}

  /**
   * Open a file for line-oriented reading, writing or appending
   *
   * @param filePath - File to open
   * @param mode - "r" to read, "w" to truncate and write, "a" to append
   * @param options - Buffer size and gzip output settings
   * @throws {FileError} When the file cannot be opened
   * @throws {CompressionError} When a gzip file is corrupt at its start
   */
  static async open(
    filePath: string,
    mode: FileMode = "r",
    options: SequenceIOOptions = {}
  ): Promise<TransparentStream> {
    const path = validatePath(filePath);
    const resolved = resolveOptions(options);
    const scope = Effect.runSync(Scope.make());

    let file: FileSystem.File;
    try {
      file = await openHandle(path, mode, scope);
    } catch (error) {
      await Effect.runPromise(Scope.close(scope, Exit.void));
      throw FileError.fromSystemError("open", path, error);
    }

    if (mode !== "r") {
      const compression =
        resolved.autoCompress && CompressionDetector.fromExtension(path) === "gzip"
          ? "gzip"
          : "none";
      const deflater =
        compression === "gzip" ? new GzipDeflater({ level: resolved.compressionLevel }) : null;
      return new TransparentStream(path, mode, compression, file, scope, resolved, null, deflater);
    }

    try {
      const first = await readChunk(file, path, resolved.bufferSize);
      const compression =
        first === null ? "none" : CompressionDetector.fromMagicBytes(first);
      const inflater = compression === "gzip" ? new GzipInflater() : null;
      const stream = new TransparentStream(path, mode, compression, file, scope, resolved, inflater, null);
      stream.ingest(first);
      return stream;
    } catch (error) {
      await Effect.runPromise(Scope.close(scope, Exit.void));
      throw error;
    }
  }

  /**
   * Read the next line, terminator included
   *
   * @returns The line, or null at end of stream
   * @throws {FileError} When the stream is closed or not readable
   * @throws {CompressionError} When gzip data is corrupt or truncated
   */
  async readLine(): Promise<string | null> {
    this.assertOpen("read");
    if (this.mode !== "r") {
      throw new FileError(`Stream "${this.filePath}" is not open for reading`, this.filePath, "read");
    }

    for (;;) {
      for (let index = this.scannedChunks; index < this.chunks.length; index++) {
        const chunk = this.chunks[index] ?? EMPTY;
        const newline = chunk.indexOf(NEWLINE, index === 0 ? this.offset : 0);
        if (newline !== -1) {
          return this.take(index, newline + 1);
        }
      }
      this.scannedChunks = this.chunks.length;

      if (this.sourceDone) {
        if (this.chunks.length === 0) {
          return null;
        }
        const lastIndex = this.chunks.length - 1;
        return this.take(lastIndex, this.chunks[lastIndex]?.length ?? 0);
      }
      this.ingest(await readChunk(this.file, this.filePath, this.options.bufferSize));
    }
  }

  /**
   * Byte offset in the (decompressed) content: consumed by reads, or
   * produced by writes
   */
  tell(): number {
    return this.position;
  }

  /**
   * Write text at the end of the stream
   *
   * @throws {FileError} When the stream is closed, read-only or the write fails
   */
  async write(text: string): Promise<void> {
    this.assertOpen("write");
    if (this.mode === "r") {
      throw new FileError(`Stream "${this.filePath}" is not open for writing`, this.filePath, "write");
    }

    const bytes = this.encoder.encode(text);
    this.position += bytes.length;
    await this.writeChunks(this.deflater === null ? [bytes] : this.deflater.push(bytes));
  }

  /**
   * Flush pending gzip output and release the file handle
   *
   * Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    try {
      if (this.deflater !== null) {
        await this.writeChunks(this.deflater.finish());
      }
    } finally {
      await Effect.runPromise(Scope.close(this.scope, Exit.void));
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  private assertOpen(operation: "read" | "write"): void {
    if (this.closed) {
      throw new FileError(`Stream "${this.filePath}" is closed`, this.filePath, operation);
    }
  }

  /**
   * Consume everything up to `end` in chunk `lastIndex` as one line
   */
  private take(lastIndex: number, end: number): string {
    const parts: Uint8Array[] = [];
    for (let index = 0; index <= lastIndex; index++) {
      const chunk = this.chunks[index] ?? EMPTY;
      const start = index === 0 ? this.offset : 0;
      parts.push(chunk.subarray(start, index === lastIndex ? end : chunk.length));
    }

    const last = this.chunks[lastIndex] ?? EMPTY;
    const rest = this.chunks.slice(lastIndex + 1);
    this.chunks = end < last.length ? [last, ...rest] : rest;
    this.offset = end < last.length ? end : 0;
    this.scannedChunks = 0;

    const bytes = parts.length === 1 ? (parts[0] ?? EMPTY) : concatChunks(parts);
    this.position += bytes.length;
    return this.decoder.decode(bytes);
  }

  /**
   * Append a raw chunk (or end of file, as null) to the line buffer
   */
  private ingest(chunk: Uint8Array | null): void {
    let produced: Uint8Array[];
    if (chunk === null) {
      this.sourceDone = true;
      produced = this.inflater === null ? [] : this.inflater.finish();
    } else {
      produced = this.inflater === null ? [chunk] : this.inflater.push(chunk);
    }

    for (const part of produced) {
      if (part.length > 0) {
        this.chunks.push(part);
      }
    }
  }

  private async writeChunks(chunks: Uint8Array[]): Promise<void> {
    for (const chunk of chunks) {
      if (chunk.length === 0) {
        continue;
      }
      try {
        await Effect.runPromise(this.file.writeAll(chunk));
      } catch (error) {
        throw FileError.fromSystemError("write", this.filePath, error);
      }
    }
  }
}

function concatChunks(parts: Uint8Array[]): Uint8Array {
  const merged = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let cursor = 0;
  for (const part of parts) {
    merged.set(part, cursor);
    cursor += part.length;
  }
  return merged;
}

/**
 * Read the next raw chunk from a handle
 *
 * @returns The chunk, or null at end of file
 */
async function readChunk(
  file: FileSystem.File,
  path: string,
  size: number
): Promise<Uint8Array | null> {
  let chunk: Option.Option<Uint8Array>;
  try {
    chunk = await Effect.runPromise(file.readAlloc(size));
  } catch (error) {
    throw FileError.fromSystemError("read", path, error);
  }
  return Option.getOrNull(chunk);
}
