/**
 * Constants for FASTQ detection and quality offset inference
 *
 * Central location for the thresholds used by the FASTQ module.
 */

// ============================================================================
// ASCII VALUE BOUNDARIES
// ============================================================================

/**
 * ASCII code boundaries used by quality offset inference
 */
export const ASCII_BOUNDARIES = {
  /** Below this, definitely Phred+33 */
  CLEAR_PHRED33_BOUNDARY: 59,
  /** Lowest code kept in the histogram */
  HISTOGRAM_MIN: -5,
  /** Highest code kept in the histogram (~) */
  HISTOGRAM_MAX: 126,
  /** A 30th percentile above this means Phred+64 */
  PHRED64_PERCENTILE_THRESHOLD: 84,
} as const;

// ============================================================================
// INFERENCE CONFIGURATION
// ============================================================================

/**
 * Quality offset inference settings
 */
export const OFFSET_INFERENCE = {
  /** Fraction of counted qualities at or below the selected code */
  PERCENTILE: 0.3,
  /** Residue excluded from the histogram */
  EXCLUDED_RESIDUE: "N",
} as const;

// ============================================================================
// DETECTION CONFIGURATION
// ============================================================================

/**
 * FASTQ check settings
 */
export const FASTQ_DETECTION = {
  /** Characters a FASTQ sequence line may hold */
  SEQUENCE_PATTERN: /^[A-Za-z]*$/,
} as const;
