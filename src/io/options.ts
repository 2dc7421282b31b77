/**
 * Default I/O configuration and option merging
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { SequenceIOOptions, WarningHandler } from "../types";
import { SequenceIOOptionsSchema } from "../types";

/**
 * Fully resolved options, as seen by streams and codecs
 */
export interface ResolvedIOOptions {
  readonly bufferSize: number;
  readonly compressionLevel: number;
  readonly autoCompress: boolean;
  readonly onWarning: WarningHandler;
}

/**
 * Build the default warning handler for a format
 */
export function consoleWarning(format: string): WarningHandler {
  return (warning: string, lineNumber?: number): void => {
    console.warn(`${format} Warning (line ${lineNumber}): ${warning}`);
  };
}

export const DEFAULT_IO_OPTIONS: ResolvedIOOptions = {
  bufferSize: 65536,
  compressionLevel: 6,
  autoCompress: true,
  onWarning: consoleWarning("fastx-io"),
};

/**
 * Validate user options and merge them over the defaults
 *
 * @param options - User supplied options
 * @param format - Format name used by the default warning handler
 * @throws {ValidationError} When an option is out of range
 */
export function resolveOptions(
  options: SequenceIOOptions = {},
  format?: string
): ResolvedIOOptions {
  const validation = SequenceIOOptionsSchema(options);
  if (validation instanceof type.errors) {
    throw new ValidationError(
      `Invalid I/O options: ${validation.summary}`,
      undefined,
      "fastx-io stream configuration"
    );
  }

  return {
    bufferSize: options.bufferSize ?? DEFAULT_IO_OPTIONS.bufferSize,
    compressionLevel: options.compressionLevel ?? DEFAULT_IO_OPTIONS.compressionLevel,
    autoCompress: options.autoCompress ?? DEFAULT_IO_OPTIONS.autoCompress,
    onWarning:
      options.onWarning ??
      (format !== undefined ? consoleWarning(format) : DEFAULT_IO_OPTIONS.onWarning),
  };
}
