/**
 * Quality offset inference for FASTQ files
 *
 * Two-pass heuristic: any quality code below 59 settles Phred+33 at once;
 * otherwise a histogram of codes over non-N residues is built and its 30th
 * percentile decides between 33 and 64.
 *
 * @module fastq/quality
 */

import { QualityError } from "../../errors";
import type { QualityOffset, SequenceRecord } from "../../types";
import { ASCII_BOUNDARIES, OFFSET_INFERENCE } from "./constants";

/**
 * Histogram of quality codes used to infer the encoding offset
 *
 * @example
 * ```typescript
 * const histogram = new QualityHistogram();
 * for await (const record of reader) {
 *   if (histogram.add(record) === 33) break;
 * }
 * const offset = histogram.offset();
 * ```
 */
export class QualityHistogram {
  private readonly counts: number[];
  private total = 0;
  private settled: QualityOffset | null = null;

  constructor() {
    this.counts = new Array<number>(
      ASCII_BOUNDARIES.HISTOGRAM_MAX - ASCII_BOUNDARIES.HISTOGRAM_MIN + 1
    ).fill(0);
  }

  /** Number of codes counted so far */
  get size(): number {
    return this.total;
  }

  /**
   * Count the qualities of one record
   *
   * Residues and qualities are paired up to the shorter of the two strings.
   *
   * @returns 33 when a code below 59 settles the offset, otherwise null
   * @throws {QualityError} When a code is above the printable range
   */
  add(record: SequenceRecord): QualityOffset | null {
    if (this.settled !== null) {
      return this.settled;
    }

    const quality = record.quality ?? "";
    const length = Math.min(record.sequence.length, quality.length);
    for (let i = 0; i < length; i++) {
      const code = quality.charCodeAt(i);
      if (code < ASCII_BOUNDARIES.CLEAR_PHRED33_BOUNDARY) {
        this.settled = 33;
        return this.settled;
      }
      if (code > ASCII_BOUNDARIES.HISTOGRAM_MAX) {
        throw new QualityError(
          `quality code ${code} at position ${i} is above ${ASCII_BOUNDARIES.HISTOGRAM_MAX}`,
          record.id,
          "phred33/phred64"
        );
      }
      if (record.sequence.charAt(i) !== OFFSET_INFERENCE.EXCLUDED_RESIDUE) {
        this.counts[code - ASCII_BOUNDARIES.HISTOGRAM_MIN] =
          (this.counts[code - ASCII_BOUNDARIES.HISTOGRAM_MIN] ?? 0) + 1;
        this.total++;
      }
    }

    return null;
  }

  /**
   * Offset implied by what has been counted
   *
   * @returns 33 or 64, or null when nothing was counted
   */
  offset(): QualityOffset | null {
    if (this.settled !== null) {
      return this.settled;
    }
    const code = this.percentileCode(OFFSET_INFERENCE.PERCENTILE);
    if (code === null) {
      return null;
    }
    return code > ASCII_BOUNDARIES.PHRED64_PERCENTILE_THRESHOLD ? 64 : 33;
  }

  /**
   * Smallest counted code whose cumulative count reaches
   * `floor(total * fraction)`; empty bins are never selected
   */
  percentileCode(fraction: number): number | null {
    if (this.total === 0) {
      return null;
    }

    const target = Math.floor(this.total * fraction);
    let cumulative = 0;
    for (let index = 0; index < this.counts.length; index++) {
      const count = this.counts[index] ?? 0;
      if (count === 0) {
        continue;
      }
      cumulative += count;
      if (cumulative >= target) {
        return index + ASCII_BOUNDARIES.HISTOGRAM_MIN;
      }
    }
    return null;
  }
}

/**
 * Infer the quality offset from a sequence of records
 *
 * Stops pulling records as soon as the offset is settled.
 *
 * @returns 33, 64, or null when no quality was counted
 * @throws {QualityError} When a code is above the printable range
 */
export async function inferQualityOffset(
  records: AsyncIterable<SequenceRecord>
): Promise<QualityOffset | null> {
  const histogram = new QualityHistogram();
  for await (const record of records) {
    if (histogram.add(record) !== null) {
      break;
    }
  }
  return histogram.offset();
}
