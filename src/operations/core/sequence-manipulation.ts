/**
 * Reverse-complement transforms for sequence records
 *
 * @module sequence-manipulation
 */

import { InvalidSymbolError } from "../../errors";
import type { Alphabet, SequenceRecord } from "../../types";

// =============================================================================
// CONSTANTS
// =============================================================================

/**
 * DNA complement mapping including IUPAC ambiguity codes
 *
 * `U` maps to `A` like `T` does, so a DNA reverse complement of RNA input
 * cannot be reversed back to `U`.
 */
export const DNA_COMPLEMENT: Readonly<Record<string, string>> = Object.freeze({
  A: "T", T: "A", G: "C", C: "G", U: "A", N: "N",
  a: "t", t: "a", g: "c", c: "g", u: "a", n: "n",
  W: "W", S: "S", M: "K", K: "M", R: "Y", Y: "R", B: "V", V: "B", D: "H", H: "D",
  w: "w", s: "s", m: "k", k: "m", r: "y", y: "r", b: "v", v: "b", d: "h", h: "d",
});

/**
 * RNA complement mapping (U instead of T)
 */
export const RNA_COMPLEMENT: Readonly<Record<string, string>> = Object.freeze({
  A: "U", T: "A", G: "C", C: "G", U: "A", N: "N",
  a: "u", t: "a", g: "c", c: "g", u: "a", n: "n",
  W: "W", S: "S", M: "K", K: "M", R: "Y", Y: "R", B: "V", V: "B", D: "H", H: "D",
  w: "w", s: "s", m: "k", k: "m", r: "y", y: "r", b: "v", v: "b", d: "h", h: "d",
});

const COMPLEMENT_TABLES: Readonly<Record<Alphabet, Readonly<Record<string, string>>>> = {
  dna: DNA_COMPLEMENT,
  rna: RNA_COMPLEMENT,
};

// =============================================================================
// EXPORTED FUNCTIONS
// =============================================================================

/**
 * Reverse-complement a residue string
 *
 * @example
 * ```typescript
 * reverseComplementSequence('ACGTN', 'dna'); // 'NACGT'
 * reverseComplementSequence('ACGU', 'rna');  // 'ACGU'
 * ```
 *
 * @param sequence - Residues to transform
 * @param alphabet - Complement table to use
 * @param sequenceId - Id reported when a symbol is not in the table
 * @throws {InvalidSymbolError} When a residue has no complement
 */
export function reverseComplementSequence(
  sequence: string,
  alphabet: Alphabet,
  sequenceId = "unknown"
): string {
  const table = COMPLEMENT_TABLES[alphabet];
  const result = new Array<string>(sequence.length);

  for (let i = 0; i < sequence.length; i++) {
    const base = sequence.charAt(i);
    const comp = table[base];
    if (comp === undefined) {
      throw new InvalidSymbolError(sequenceId, base, i, alphabet);
    }
    result[sequence.length - 1 - i] = comp;
  }

  return result.join("");
}

function reverseComplementRecord(record: SequenceRecord, alphabet: Alphabet): SequenceRecord {
  const sequence = reverseComplementSequence(record.sequence, alphabet, record.id);

  return {
    id: record.id,
    ...(record.description !== undefined && { description: record.description }),
    sequence,
    ...(record.quality !== undefined && { quality: [...record.quality].reverse().join("") }),
  };
}

/**
 * DNA reverse complement of a record
 *
 * The quality string, when present, is reversed without transformation so it
 * stays aligned with the residues.
 *
 * @throws {InvalidSymbolError} When a residue has no DNA complement
 */
export function dnaReverseComplement(record: SequenceRecord): SequenceRecord {
  return reverseComplementRecord(record, "dna");
}

/**
 * RNA reverse complement of a record
 *
 * @throws {InvalidSymbolError} When a residue has no RNA complement
 */
export function rnaReverseComplement(record: SequenceRecord): SequenceRecord {
  return reverseComplementRecord(record, "rna");
}
