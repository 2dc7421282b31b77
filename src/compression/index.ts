/**
 * Compression module for sequence files
 *
 * @example Choosing output compression
 * ```typescript
 * import { CompressionDetector, GzipDeflater } from './compression';
 *
 * if (CompressionDetector.fromExtension('out.fastq.gz') === 'gzip') {
 *   const deflater = new GzipDeflater({ level: 6 });
 * }
 * ```
 */

export { CompressionDetector } from "./detector";
export { GzipDeflater, GzipInflater, type GzipOptions } from "./gzip";

export type { CompressionFormat } from "../types";
export { CompressionError } from "../errors";
