/**
 * Constants shared by the FASTA and FASTQ format checks
 */

/**
 * Format check settings
 */
export const DETECTION_DEFAULTS = {
  /** Records examined by a format check */
  MAX_RECORDS: 10,
} as const;
