/**
 * Tests for line-oriented streams with transparent gzip
 */

import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { FileError, ValidationError } from "../../src/errors";
import { TransparentStream } from "../../src/io/transparent-stream";
import { createFixtureDir, type FixtureDir } from "../utils/fixtures";

let fixtures: FixtureDir;

beforeAll(() => {
  fixtures = createFixtureDir("stream");
});

afterAll(() => {
  fixtures.cleanup();
});

async function readLines(stream: TransparentStream): Promise<string[]> {
  const lines: string[] = [];
  for (let line = await stream.readLine(); line !== null; line = await stream.readLine()) {
    lines.push(line);
  }
  return lines;
}

describe("TransparentStream reading", () => {
  test("returns lines with their terminators", async () => {
    const stream = await TransparentStream.open(fixtures.write("lines.txt", "a\nbc\r\nd"));
    try {
      expect(await readLines(stream)).toEqual(["a\n", "bc\r\n", "d"]);
      expect(await stream.readLine()).toBeNull();
    } finally {
      await stream.close();
    }
  });

  test("tell reports consumed bytes", async () => {
    const stream = await TransparentStream.open(fixtures.write("tell.txt", "ab\ncdef\n"));
    try {
      expect(stream.tell()).toBe(0);
      await stream.readLine();
      expect(stream.tell()).toBe(3);
      await stream.readLine();
      expect(stream.tell()).toBe(8);
    } finally {
      await stream.close();
    }
  });

  test("joins lines spanning several reads", async () => {
    const long = "A".repeat(3000);
    const path = fixtures.write("long.txt", `${long}\nshort\n${long}`);

    const stream = await TransparentStream.open(path, "r", { bufferSize: 1024 });
    try {
      expect(await readLines(stream)).toEqual([`${long}\n`, "short\n", long]);
    } finally {
      await stream.close();
    }
  });

  test("reads a line spanning thousands of chunks", async () => {
    const sequence = "A".repeat(4_000_000);
    const path = fixtures.write("chromosome.fa", `>chr\n${sequence}\n>next\nAC\n`);

    const stream = await TransparentStream.open(path, "r", { bufferSize: 1024 });
    try {
      expect(await stream.readLine()).toBe(">chr\n");
      expect(await stream.readLine()).toBe(`${sequence}\n`);
      expect(await stream.readLine()).toBe(">next\n");
      expect(await stream.readLine()).toBe("AC\n");
      expect(stream.tell()).toBe(sequence.length + 15);
    } finally {
      await stream.close();
    }
  });

  test("decodes multi-byte characters split across chunks", async () => {
    const text = `>${"é".repeat(1500)}\n`;
    const stream = await TransparentStream.open(fixtures.write("split-utf8.txt", `${text}x`), "r", {
      bufferSize: 1024,
    });
    try {
      expect(await stream.readLine()).toBe(text);
      expect(await stream.readLine()).toBe("x");
    } finally {
      await stream.close();
    }
  });

  test("decodes multi-byte characters", async () => {
    const stream = await TransparentStream.open(fixtures.write("utf8.txt", ">séq 世界\n"));
    try {
      expect(await stream.readLine()).toBe(">séq 世界\n");
    } finally {
      await stream.close();
    }
  });

  test("detects gzip from content, not from the name", async () => {
    const gz = await TransparentStream.open(fixtures.writeGzip("packed.txt", "x\ny\n"));
    const plain = await TransparentStream.open(fixtures.write("plain.txt.gz", "x\ny\n"));
    try {
      expect(gz.compression).toBe("gzip");
      expect(await readLines(gz)).toEqual(["x\n", "y\n"]);
      expect(plain.compression).toBe("none");
      expect(await readLines(plain)).toEqual(["x\n", "y\n"]);
    } finally {
      await gz.close();
      await plain.close();
    }
  });

  test("tell counts decompressed bytes", async () => {
    const stream = await TransparentStream.open(fixtures.writeGzip("tell.gz", "abc\nde\n"));
    try {
      await stream.readLine();
      expect(stream.tell()).toBe(4);
    } finally {
      await stream.close();
    }
  });

  test("an empty file ends immediately", async () => {
    const stream = await TransparentStream.open(fixtures.write("empty.txt", ""));
    try {
      expect(stream.compression).toBe("none");
      expect(await stream.readLine()).toBeNull();
    } finally {
      await stream.close();
    }
  });
});

describe("TransparentStream writing", () => {
  test("chooses gzip output from the suffix", async () => {
    const path = fixtures.path("out.txt.gz");
    const stream = await TransparentStream.open(path, "w");

    expect(stream.compression).toBe("gzip");
    await stream.write("one\n");
    await stream.write("two\n");
    expect(stream.tell()).toBe(8);
    await stream.close();

    expect(fixtures.readGzip("out.txt.gz")).toBe("one\ntwo\n");
  });

  test("writes plain text without the suffix", async () => {
    const path = fixtures.path("out.txt");
    const stream = await TransparentStream.open(path, "w");

    expect(stream.compression).toBe("none");
    await stream.write("one\n");
    await stream.close();

    expect(fixtures.read("out.txt")).toBe("one\n");
  });

  test("writes plain text for .gzip and upper-case .GZ suffixes", async () => {
    for (const name of ["out.fa.gzip", "out.fa.GZ"]) {
      const stream = await TransparentStream.open(fixtures.path(name), "w");
      expect(stream.compression).toBe("none");
      await stream.write(">s1\nAC\n");
      await stream.close();

      expect(fixtures.read(name)).toBe(">s1\nAC\n");
    }
  });

  test("honours the compression level", async () => {
    const path = fixtures.path("stored.gz");
    const stream = await TransparentStream.open(path, "w", { compressionLevel: 0 });
    await stream.write("ACGT".repeat(100));
    await stream.close();

    expect(fixtures.readGzip("stored.gz")).toBe("ACGT".repeat(100));
  });
});

describe("TransparentStream errors", () => {
  test("opening a missing file fails", async () => {
    const error = await TransparentStream.open(fixtures.path("missing.txt")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FileError);
    expect(error).toMatchObject({ operation: "open", filePath: fixtures.path("missing.txt") });
  });

  test("an empty path is rejected", async () => {
    await expect(TransparentStream.open("")).rejects.toThrow(FileError);
  });

  test("a path with a null byte is rejected", async () => {
    await expect(TransparentStream.open("bad\0name")).rejects.toThrow(FileError);
  });

  test("invalid options are rejected", async () => {
    const path = fixtures.write("options.txt", "x\n");

    await expect(TransparentStream.open(path, "r", { compressionLevel: 12 })).rejects.toThrow(
      ValidationError
    );
  });

  test("mode mismatches fail with FileError", async () => {
    const reader = await TransparentStream.open(fixtures.write("mode.txt", "x\n"));
    const writer = await TransparentStream.open(fixtures.path("mode-out.txt"), "w");
    try {
      await expect(reader.write("y\n")).rejects.toMatchObject({ operation: "write" });
      await expect(writer.readLine()).rejects.toMatchObject({ operation: "read" });
    } finally {
      await reader.close();
      await writer.close();
    }
  });

  test("a closed stream refuses reads and writes", async () => {
    const stream = await TransparentStream.open(fixtures.path("closed.txt"), "w");
    await stream.close();
    await stream.close();

    expect(stream.isClosed).toBe(true);
    await expect(stream.write("x")).rejects.toThrow(FileError);
  });
});
