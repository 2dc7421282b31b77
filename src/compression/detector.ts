/**
 * Compression format detection for sequence files
 *
 * Reading and writing use different policies on purpose: input is sniffed
 * by magic bytes, so a gzipped file without a `.gz` suffix still reads;
 * output is compressed purely by file extension.
 */

import type { CompressionFormat } from "../types";
import { CompressionError } from "../errors";

const GZIP_MAGIC_FIRST_BYTE = 0x1f;
const GZIP_MAGIC_SECOND_BYTE = 0x8b;

const GZIP_MAGIC_BYTES = new Uint8Array([GZIP_MAGIC_FIRST_BYTE, GZIP_MAGIC_SECOND_BYTE]);

const GZIP_SUFFIX = ".gz";

/**
 * Compression format detector
 *
 * @example Detection from file extension
 * ```typescript
 * CompressionDetector.fromExtension('/data/reads.fastq.gz'); // 'gzip'
 * ```
 *
 * @example Detection from magic bytes
 * ```typescript
 * CompressionDetector.fromMagicBytes(new Uint8Array([0x1f, 0x8b, 0x08])); // 'gzip'
 * ```
 */
export class CompressionDetector {
  /**
   * Number of leading bytes needed by {@link fromMagicBytes}
   */
  static readonly MAGIC_BYTES_LENGTH = GZIP_MAGIC_BYTES.length;

  /**
   * Detect compression format from file extension (write path)
   *
   * Only the exact, case-sensitive `.gz` suffix selects gzip.
   *
   * @param filePath File path to analyze
   * @throws {CompressionError} If the path is empty
   */
  static fromExtension(filePath: string): CompressionFormat {
    if (filePath.length === 0) {
      throw new CompressionError("File path must not be empty", "none", "detect");
    }

    return filePath.endsWith(GZIP_SUFFIX) ? "gzip" : "none";
  }

  /**
   * Detect compression format from the first bytes of a file (read path)
   *
   * Fewer bytes than the gzip signature, including an empty file, are
   * reported as uncompressed.
   */
  static fromMagicBytes(bytes: Uint8Array): CompressionFormat {
    if (bytes.length < GZIP_MAGIC_BYTES.length) {
      return "none";
    }
    return GZIP_MAGIC_BYTES.every((byte, index) => bytes[index] === byte) ? "gzip" : "none";
  }
}
