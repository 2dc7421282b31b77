/**
 * FASTQ Format Module
 *
 * Four-line FASTQ reading and writing with transparent gzip, a format check
 * and quality offset inference.
 *
 * @module fastq
 *
 * @example Quality offset of a file
 * ```typescript
 * import { FastqIO } from './formats/fastq';
 *
 * const offset = await FastqIO.qualOffset('reads.fastq.gz'); // 33, 64 or null
 * ```
 */

export { ASCII_BOUNDARIES, FASTQ_DETECTION, OFFSET_INFERENCE } from "./constants";
export { type FastqRejection, validateFastq } from "./detection";
export { FastqIO } from "./io";
export { inferQualityOffset, QualityHistogram } from "./quality";
