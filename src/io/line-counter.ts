// Streaming line counters over transparently decompressed files

import type { SequenceIOOptions } from "../types";
import { TransparentStream } from "./transparent-stream";

/**
 * Count the lines of a file that satisfy a predicate
 *
 * A last line without a terminator still counts.
 *
 * @param filePath - File to scan (plain or gzip)
 * @param predicate - Receives each line, terminator included
 */
export async function countMatchingLines(
  filePath: string,
  predicate: (line: string) => boolean,
  options?: SequenceIOOptions
): Promise<number> {
  const stream = await TransparentStream.open(filePath, "r", options);
  let count = 0;
  try {
    for (let line = await stream.readLine(); line !== null; line = await stream.readLine()) {
      if (predicate(line)) {
        count++;
      }
    }
  } finally {
    await stream.close();
  }
  return count;
}

/**
 * Count all lines of a file (plain or gzip)
 */
export async function countLines(filePath: string, options?: SequenceIOOptions): Promise<number> {
  return countMatchingLines(filePath, () => true, options);
}
