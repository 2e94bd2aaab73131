/**
 * size.test.ts — Directory size and du-style formatting.
 */

import { describe, it, after } from "node:test";
import assert from "node:assert/strict";
import { directorySize, formatSize } from "./size.js";
import { makeTempDir, removeTempDirs, writeTree } from "../../tests/helpers/index.js";

after(removeTempDirs);

describe("formatSize", () => {
  it("prints bytes below 1K as-is", () => {
    assert.equal(formatSize(0), "0B");
    assert.equal(formatSize(512), "512B");
  });

  it("uses one decimal below 10, rounded up", () => {
    assert.equal(formatSize(1024), "1.0K");
    assert.equal(formatSize(1536), "1.5K");
    assert.equal(formatSize(1025), "1.1K");
  });

  it("uses whole numbers from 10 up", () => {
    assert.equal(formatSize(10 * 1024 * 1024), "10M");
    assert.equal(formatSize(150 * 1024 * 1024 + 1), "151M");
  });

  it("rolls 9.95-ish up to 10", () => {
    assert.equal(formatSize(Math.round(9.99 * 1024)), "10K");
  });
});

describe("directorySize", () => {
  it("sums file sizes recursively", () => {
    const dir = makeTempDir();
    writeTree(dir, { "a.txt": "12345", "sub/b.txt": "123", "empty/": "" });
    assert.equal(directorySize(dir), 8);
  });
});
