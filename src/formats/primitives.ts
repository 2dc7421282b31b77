/**
 * Header parsing and record formatting shared by the FASTA and FASTQ codecs
 */

import { type } from "arktype";
import { ValidationError } from "../errors";
import type { SequenceRecord } from "../types";
import { SequenceRecordSchema } from "../types";

/**
 * Split a header line into id and description
 *
 * The leading marker character (`>` or `@`) is dropped, then the text is
 * split on its first whitespace run. Returns null when there is no id.
 *
 * @example
 * ```typescript
 * parseHeader('>s1 desc one\n'); // { id: 's1', description: 'desc one' }
 * parseHeader('@r1\n');          // { id: 'r1' }
 * parseHeader('>\n');            // null
 * ```
 */
export function parseHeader(line: string): { id: string; description?: string } | null {
  const body = line.trim().slice(1).trim();
  if (body.length === 0) {
    return null;
  }

  const firstSpace = body.search(/\s/);
  if (firstSpace === -1) {
    return { id: body };
  }

  return {
    id: body.slice(0, firstSpace),
    description: body.slice(firstSpace + 1).trim(),
  };
}

/**
 * Build a header line (without terminator) from a marker and a record
 */
export function formatHeader(marker: ">" | "@", record: SequenceRecord): string {
  return record.description !== undefined
    ? `${marker}${record.id} ${record.description}`
    : `${marker}${record.id}`;
}

/**
 * Build a record, leaving `description` and `quality` out when absent
 */
export function buildRecord(
  header: { id: string; description?: string },
  sequence: string,
  quality?: string
): SequenceRecord {
  return {
    id: header.id,
    ...(header.description !== undefined && { description: header.description }),
    sequence,
    ...(quality !== undefined && { quality }),
  };
}

/**
 * Create a validated sequence record
 *
 * @example
 * ```typescript
 * const read = createSequence({ id: 'r1', sequence: 'ACGT', quality: 'IIII' });
 * ```
 *
 * @throws {ValidationError} When the id is empty or holds whitespace, or the
 *   quality length differs from the sequence length
 */
export function createSequence(record: SequenceRecord): SequenceRecord {
  const validation = SequenceRecordSchema(record);
  if (validation instanceof type.errors) {
    throw new ValidationError(`Invalid sequence record: ${validation.summary}`);
  }
  return buildRecord(
    {
      id: record.id,
      ...(record.description !== undefined && { description: record.description }),
    },
    record.sequence,
    record.quality
  );
}
