import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { readOutput, tailBytes, tailLines } from "../src/infrastructure/fs/fileUtils.js";
import { makeTempDir, removeTempDir } from "./helpers.js";

describe("fileUtils", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = makeTempDir();
    file = join(dir, "out.log");
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it("tails lines, ignoring the final newline", () => {
    writeFileSync(file, "one\ntwo\nthree\n");
    expect(tailLines(file, 2)).toEqual(["two", "three"]);
    expect(tailLines(join(dir, "missing.log"), 2)).toEqual([]);
  });

  it("starts a byte tail on the next whole line", () => {
    // 10 lines of 11 bytes; the last 30 bytes begin inside a two-byte character
    writeFileSync(file, "ééééé\n".repeat(10));
    expect(tailBytes(file, 30)).toBe("ééééé\nééééé\n");
  });

  it("never starts a byte tail inside a character", () => {
    writeFileSync(file, "éééé");
    expect(tailBytes(file, 5)).toBe("éé");
  });

  it("marks output cut to the byte cap", () => {
    writeFileSync(file, "ééééé\n".repeat(10));
    expect(readOutput(file, { maxBytes: 30 })).toBe(
      "[Output truncated. Use tail for more.]\n\nééééé\nééééé"
    );
  });
});
