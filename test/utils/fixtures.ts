/**
 * Temporary fixture directories for file-based tests
 */

import { gunzipSync, gzipSync, strFromU8, strToU8 } from "fflate";
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

export interface FixtureDir {
  readonly root: string;
  path(name: string): string;
  write(name: string, content: string): string;
  writeGzip(name: string, content: string): string;
  writeBytes(name: string, bytes: Uint8Array): string;
  read(name: string): string;
  readGzip(name: string): string;
  cleanup(): void;
}

export function createFixtureDir(prefix: string): FixtureDir {
  const root = mkdtempSync(join(tmpdir(), `fastx-io-${prefix}-`));
  const path = (name: string): string => join(root, name);

  return {
    root,
    path,
    write(name, content) {
      writeFileSync(path(name), content);
      return path(name);
    },
    writeGzip(name, content) {
      writeFileSync(path(name), gzipSync(strToU8(content)));
      return path(name);
    },
    writeBytes(name, bytes) {
      writeFileSync(path(name), bytes);
      return path(name);
    },
    read(name) {
      return readFileSync(path(name), "utf-8");
    },
    readGzip(name) {
      return strFromU8(gunzipSync(new Uint8Array(readFileSync(path(name)))));
    },
    cleanup() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}
