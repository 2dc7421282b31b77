/**
 * File inspection utilities
 *
 * Small checks built on TransparentStream, used before a codec is opened.
 */

import { TransparentStream } from "./transparent-stream";

/**
 * Check whether a file holds gzip-compressed content
 *
 * Looks at the content, not the file name: `reads.fastq` holding gzip data
 * is reported as gzip, `reads.fastq.gz` holding plain text is not.
 *
 * @throws {FileError} If the file cannot be opened
 */
export async function isGzip(path: string): Promise<boolean> {
  const stream = await TransparentStream.open(path, "r");
  try {
    return stream.compression === "gzip";
  } finally {
    await stream.close();
  }
}
