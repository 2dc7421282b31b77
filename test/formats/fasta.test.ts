/**
 * Tests for FASTA reading and writing
 */

import { gzipSync, strToU8 } from "fflate";
import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { CompressionError, FileError, ParseError } from "../../src/errors";
import { FastaIO } from "../../src/formats/fasta";
import type { SequenceRecord } from "../../src/types";
import { createFixtureDir, type FixtureDir } from "../utils/fixtures";

const TWO_RECORDS = ">s1 desc one\nACGT\nACGT\n>s2\nTTTT\n";

let fixtures: FixtureDir;

beforeAll(() => {
  fixtures = createFixtureDir("fasta");
});

afterAll(() => {
  fixtures.cleanup();
});

async function readAll(path: string): Promise<SequenceRecord[]> {
  return FastaIO.use(path, "r", async (reader) => {
    const records: SequenceRecord[] = [];
    for await (const record of reader) {
      records.push(record);
    }
    return records;
  });
}

describe("FastaIO reading", () => {
  test("joins wrapped sequence lines", async () => {
    const path = fixtures.write("two.fasta", TWO_RECORDS);

    expect(await readAll(path)).toEqual([
      { id: "s1", description: "desc one", sequence: "ACGTACGT" },
      { id: "s2", sequence: "TTTT" },
    ]);
  });

  test("returns null for an empty file", async () => {
    const path = fixtures.write("empty.fasta", "");

    await FastaIO.use(path, "r", async (reader) => {
      expect(await reader.nextSeq()).toBeNull();
      expect(await reader.nextSeq()).toBeNull();
    });
  });

  test("returns null after the last record", async () => {
    const path = fixtures.write("one.fasta", ">s1\nAC\n");

    await FastaIO.use(path, "r", async (reader) => {
      expect(await reader.nextSeq()).toEqual({ id: "s1", sequence: "AC" });
      expect(await reader.nextSeq()).toBeNull();
      expect(await reader.nextSeq()).toBeNull();
    });
  });

  test("reads a last line without newline", async () => {
    const path = fixtures.write("no-eol.fasta", ">s1\nAC\nGT");

    expect(await readAll(path)).toEqual([{ id: "s1", sequence: "ACGT" }]);
  });

  test("yields an empty sequence for a trailing header", async () => {
    const path = fixtures.write("trailing-header.fasta", ">s1\nACGT\n>s2\n");

    expect(await readAll(path)).toEqual([
      { id: "s1", sequence: "ACGT" },
      { id: "s2", sequence: "" },
    ]);
  });

  test("skips blank lines and line-ending noise inside a sequence", async () => {
    const path = fixtures.write("blank.fasta", ">s1 x\r\nAC\r\n\r\n  GT \r\n");

    expect(await readAll(path)).toEqual([{ id: "s1", description: "x", sequence: "ACGT" }]);
  });

  test("reads gzip content transparently", async () => {
    const path = fixtures.writeGzip("two.fasta.gz", TWO_RECORDS);

    expect(await readAll(path)).toEqual([
      { id: "s1", description: "desc one", sequence: "ACGTACGT" },
      { id: "s2", sequence: "TTTT" },
    ]);
  });

  test("rejects a first line that is not a header", async () => {
    const path = fixtures.write("no-header.fasta", "ACGT\n>s1\nAC\n");

    await FastaIO.use(path, "r", async (reader) => {
      const error = await reader.nextSeq().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({
        message: `The line 1 in "${path}" cannot be parsed by FastaIO.`,
        context: "content: ACGT",
        lineNumber: 1,
        format: "FASTA",
      });
    });
  });

  test("reports the line of a header without id", async () => {
    const path = fixtures.write("empty-id.fasta", ">s1\nAC\n>\nGT\n");

    await FastaIO.use(path, "r", async (reader) => {
      expect(await reader.nextSeq()).toEqual({ id: "s1", sequence: "AC" });

      const error = await reader.nextSeq().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ParseError);
      expect(error).toMatchObject({ lineNumber: 3, context: "content: >" });
    });
  });

  test("reports truncated gzip content with the file and line", async () => {
    const text = Array.from({ length: 300 }, (_, i) => `>s${i}\n${"ACGTTGCA".slice(i % 8)}${i}\n`).join("");
    const packed = gzipSync(strToU8(text));
    const path = fixtures.writeBytes("cut.fasta.gz", packed.subarray(0, packed.length - 12));

    const error = await readAll(path).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({ filePath: path, format: "FASTA" });
    expect(error instanceof ParseError ? error.cause : undefined).toBeInstanceOf(CompressionError);
  });
});

describe("FastaIO writing", () => {
  test("writes the sequence on a single line and drops quality", async () => {
    const path = fixtures.path("out.fasta");

    await FastaIO.use(path, "w", async (writer) => {
      await writer.write({ id: "s1", description: "desc one", sequence: "ACGTACGT" });
      await writer.write({ id: "s2", sequence: "TTTT", quality: "IIII" });
    });

    expect(fixtures.read("out.fasta")).toBe(">s1 desc one\nACGTACGT\n>s2\nTTTT\n");
  });

  test("round-trips through gzip", async () => {
    const path = fixtures.path("out.fasta.gz");
    const records: SequenceRecord[] = [
      { id: "s1", description: "desc one", sequence: "ACGTACGT" },
      { id: "s2", sequence: "TTTT" },
    ];

    await FastaIO.use(path, "w", async (writer) => {
      for (const record of records) {
        await writer.write(record);
      }
    });

    expect(fixtures.readGzip("out.fasta.gz")).toBe(">s1 desc one\nACGTACGT\n>s2\nTTTT\n");
    expect(await readAll(path)).toEqual(records);
  });

  test("appends a gzip member that reads back with the first", async () => {
    const path = fixtures.path("append.fasta.gz");

    await FastaIO.use(path, "w", (writer) => writer.write({ id: "s1", sequence: "ACGT" }));
    await FastaIO.use(path, "a", (writer) => writer.write({ id: "s2", description: "more", sequence: "TT" }));

    expect(await readAll(path)).toEqual([
      { id: "s1", sequence: "ACGT" },
      { id: "s2", description: "more", sequence: "TT" },
    ]);
  });

  test("formatRecord omits the final newline", async () => {
    const path = fixtures.path("format.fasta");

    const text = await FastaIO.use(path, "w", async (writer) =>
      writer.formatRecord({ id: "s1", sequence: "ACGT" })
    );

    expect(text).toBe(">s1\nACGT");
  });

  test("reading from a write-mode codec fails", async () => {
    const path = fixtures.path("write-only.fasta");

    await FastaIO.use(path, "w", async (writer) => {
      const error = await writer.nextSeq().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(FileError);
      expect(error).toMatchObject({ operation: "read" });
    });
  });
});

describe("FastaIO.nbSeq", () => {
  test("counts header lines", async () => {
    const path = fixtures.write("count.fasta", TWO_RECORDS);

    expect(await FastaIO.nbSeq(path)).toBe(2);
  });

  test("counts header lines of gzip files", async () => {
    const path = fixtures.writeGzip("count.fasta.gz", `${TWO_RECORDS}>s3\nA\n`);

    expect(await FastaIO.nbSeq(path)).toBe(3);
  });
});
