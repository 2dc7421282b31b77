/**
 * FASTQ format check
 *
 * Checks the first records of a file without building them. The check
 * never throws: read and decompression failures are reported as the
 * "unreadable" reason.
 *
 * @module fastq/detection
 */

import { TransparentStream } from "../../io/transparent-stream";
import type { DetectionResult, SequenceIOOptions } from "../../types";
import { DETECTION_DEFAULTS } from "../constants";
import { FASTQ_DETECTION } from "./constants";

/**
 * Why a file was rejected as FASTQ
 */
export type FastqRejection = "invalid-header" | "truncated" | "invalid-sequence" | "length-mismatch";

/**
 * Examine up to the first ten records of a file as FASTQ
 *
 * An empty file is accepted with no record checked.
 *
 * @example
 * ```typescript
 * const result = await validateFastq('reads.fastq.gz');
 * if (!result.valid) {
 *   console.log(`record ${result.record}: ${result.message}`);
 * }
 * ```
 */
export async function validateFastq(
  filePath: string,
  options?: SequenceIOOptions
): Promise<DetectionResult<FastqRejection>> {
  let stream: TransparentStream;
  try {
    stream = await TransparentStream.open(filePath, "r", options);
  } catch (error) {
    return unreadable(0, error);
  }

  let recordIndex = 0;
  try {
    while (recordIndex < DETECTION_DEFAULTS.MAX_RECORDS) {
      const header = await stream.readLine();
      if (header === null) {
        break;
      }
      recordIndex++;

      if (!header.startsWith("@")) {
        return reject("invalid-header", recordIndex, `The record ${recordIndex} in "${filePath}" has an invalid header.`);
      }

      const sequence = await stream.readLine();
      if (sequence === null) {
        return reject("truncated", recordIndex, `The record ${recordIndex} in "${filePath}" is truncated.`);
      }
      if (!FASTQ_DETECTION.SEQUENCE_PATTERN.test(sequence.trim())) {
        return reject(
          "invalid-sequence",
          recordIndex,
          `The sequence ${recordIndex} in "${filePath}" contains invalid characters.`
        );
      }

      const separator = await stream.readLine();
      const quality = separator === null ? null : await stream.readLine();
      if (quality === null) {
        return reject("truncated", recordIndex, `The record ${recordIndex} in "${filePath}" is truncated.`);
      }
      if (sequence.trim().length !== quality.trim().length) {
        return reject(
          "length-mismatch",
          recordIndex,
          `The record ${recordIndex} in "${filePath}" contains a sequence and a quality with different length.`
        );
      }
    }
  } catch (error) {
    return unreadable(recordIndex, error);
  } finally {
    await stream.close();
  }

  return { valid: true, recordsChecked: recordIndex };
}

function reject(
  reason: FastqRejection,
  record: number,
  message: string
): DetectionResult<FastqRejection> {
  return { valid: false, reason, record, message };
}

function unreadable(record: number, error: unknown): DetectionResult<FastqRejection> {
  return {
    valid: false,
    reason: "unreadable",
    record,
    message: error instanceof Error ? error.message : String(error),
  };
}
