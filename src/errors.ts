/**
 * Error handling for sequence file I/O
 *
 * Every failure surfaced by this package is a subclass of FastxError, so
 * callers can tell content problems (ParseError, FormatDetectionError,
 * InvalidSymbolError) from file system trouble (FileError, CompressionError).
 */

/**
 * Base error class for all fastx-io errors
 */
export class FastxError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly lineNumber?: number,
    public readonly context?: string,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "FastxError";
  }

  /**
   * Create a user-friendly error message with context
   */
  override toString(): string {
    let msg = `${this.name}: ${this.message}`;
    if (this.lineNumber !== undefined) {
      msg += ` (line ${this.lineNumber})`;
    }
    if (this.context !== undefined && this.context !== "") {
      msg += `\nContext: ${this.context}`;
    }
    return msg;
  }
}

/**
 * Validation errors for malformed arguments or options
 */
export class ValidationError extends FastxError {
  constructor(message: string, lineNumber?: number, context?: string) {
    super(message, "VALIDATION_ERROR", lineNumber, context);
    this.name = "ValidationError";
  }
}

/**
 * Record parsing failure, annotated with the file and line being read
 */
export class ParseError extends FastxError {
  constructor(
    message: string,
    public readonly format: string,
    lineNumber?: number,
    context?: string,
    public readonly filePath?: string,
    options?: ErrorOptions
  ) {
    super(message, "PARSE_ERROR", lineNumber, context, options);
    this.name = "ParseError";
  }

  /**
   * Build the canonical "line N cannot be parsed" error for a codec
   *
   * @param format - Format name used in the error ("FASTA", "FASTQ")
   * @param reader - Name of the codec that was reading
   * @param filePath - File being read
   * @param lineNumber - Current line number of the codec
   * @param content - Offending line content, when there is one
   * @param cause - Underlying read failure, when there is one
   */
  static forLine(
    format: string,
    reader: string,
    filePath: string,
    lineNumber: number,
    content?: string,
    cause?: unknown
  ): ParseError {
    return new ParseError(
      `The line ${lineNumber} in "${filePath}" cannot be parsed by ${reader}.`,
      format,
      lineNumber,
      content !== undefined ? `content: ${content}` : undefined,
      filePath,
      cause !== undefined ? { cause } : undefined
    );
  }
}

/**
 * Sequence-specific validation errors
 */
export class SequenceError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Sequence '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "SequenceError";
  }
}

/**
 * A residue with no entry in a complement table
 */
export class InvalidSymbolError extends SequenceError {
  constructor(
    sequenceId: string,
    public readonly symbol: string,
    public readonly position: number,
    public readonly alphabet: "dna" | "rna"
  ) {
    super(
      `invalid ${alphabet.toUpperCase()} symbol '${symbol}' at position ${position}`,
      sequenceId,
      undefined,
      `Symbol code: ${symbol.charCodeAt(0)}`
    );
    this.name = "InvalidSymbolError";
  }
}

/**
 * Quality score-specific errors for FASTQ data
 */
export class QualityError extends ValidationError {
  constructor(
    message: string,
    public readonly sequenceId: string,
    public readonly qualityEncoding?: string,
    lineNumber?: number,
    context?: string
  ) {
    super(`Quality scores for '${sequenceId}': ${message}`, lineNumber, context);
    this.name = "QualityError";
  }
}

/**
 * Neither the FASTQ nor the FASTA detector accepted a file
 */
export class FormatDetectionError extends FastxError {
  constructor(
    message: string,
    public readonly filePath: string,
    context?: string
  ) {
    super(message, "FORMAT_DETECTION_ERROR", undefined, context);
    this.name = "FormatDetectionError";
  }

  /**
   * Create the error raised by the reader factory
   */
  static forUnrecognizedFile(filePath: string): FormatDetectionError {
    return new FormatDetectionError(
      `The file ${filePath} does not have a valid format for 'SequenceFileReader'.`,
      filePath,
      "Tried formats: FASTQ, FASTA"
    );
  }
}

/**
 * Compression/decompression errors with detailed context
 */
export class CompressionError extends FastxError {
  constructor(
    message: string,
    public readonly format: "gzip" | "none",
    public readonly operation: "detect" | "decompress" | "compress" | "validate",
    public readonly bytesProcessed?: number,
    context?: string
  ) {
    super(message, "COMPRESSION_ERROR", undefined, context);
    this.name = "CompressionError";
  }

  /**
   * Create compression error from system error
   */
  static fromSystemError(
    format: CompressionError["format"],
    operation: CompressionError["operation"],
    systemError: unknown,
    bytesProcessed?: number
  ): CompressionError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = CompressionError.getSuggestionForCompressionError(format, errorMessage);

    return new CompressionError(
      `${operation} operation failed for ${format}: ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      format,
      operation,
      bytesProcessed,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForCompressionError(
    format: CompressionError["format"],
    errorMessage: string
  ): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("magic") || msg.includes("header")) {
      return `File may be corrupted or not actually ${format} compressed`;
    }
    if (msg.includes("truncated") || msg.includes("unexpected eof") || msg.includes("unexpected end")) {
      return "File appears to be truncated or incomplete";
    }
    if (msg.includes("crc") || msg.includes("checksum")) {
      return "Data integrity check failed - file may be corrupted";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.bytesProcessed !== undefined) {
      msg += `\nBytes processed: ${this.bytesProcessed}`;
    }

    return msg;
  }
}

/**
 * File I/O errors carrying the path and the failed operation
 */
export class FileError extends FastxError {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly operation: "read" | "write" | "open" | "close",
    public readonly systemError?: unknown,
    context?: string
  ) {
    super(message, "FILE_ERROR", undefined, context);
    this.name = "FileError";
  }

  /**
   * Create file error with system error context
   */
  static fromSystemError(
    operation: FileError["operation"],
    filePath: string,
    systemError: unknown
  ): FileError {
    const errorMessage = systemError instanceof Error ? systemError.message : String(systemError);
    const suggestion = FileError.getSuggestionForSystemError(errorMessage);

    return new FileError(
      `${operation} operation failed for "${filePath}": ${errorMessage}${suggestion !== undefined ? `. ${suggestion}` : ""}`,
      filePath,
      operation,
      systemError,
      `System error: ${errorMessage}`
    );
  }

  private static getSuggestionForSystemError(errorMessage: string): string | undefined {
    const msg = errorMessage.toLowerCase();

    if (msg.includes("enoent") || msg.includes("no such file")) {
      return "Check that the file path is correct and the file exists";
    }
    if (msg.includes("eacces") || msg.includes("permission denied")) {
      return "Check file permissions or run with appropriate privileges";
    }
    if (msg.includes("eisdir") || msg.includes("is a directory")) {
      return "Path points to a directory, not a file";
    }
    if (msg.includes("emfile") || msg.includes("too many open files")) {
      return "Close unused file handles or increase system limits";
    }

    return undefined;
  }

  override toString(): string {
    let msg = super.toString();

    if (this.systemError instanceof Error) {
      msg += `\nSystem Error: ${this.systemError.name}: ${this.systemError.message}`;
    }

    return msg;
  }
}
