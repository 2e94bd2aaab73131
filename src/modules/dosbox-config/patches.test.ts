/**
 * ============================================================
 *  config patches — Unit Tests
 * ============================================================
 *
 * One block per rewrite rule. Every rule is a pure function over
 * lines, so no files are involved.
 *
 * Module under test: src/modules/dosbox-config/patches.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe } from "node:test";
import assert from "node:assert/strict";
import {
  sharpenOutput,
  hasBilinearOutput,
  redirectCdImage,
  fixMountPaths,
  patchAutoexec,
} from "./patches.js";
import { splitLines, joinLines } from "./config-file.js";

// ─── sharpenOutput ────────────────────────────────────────────────────────────

describe("sharpenOutput — output=opengl → output=openglnb", () => {
  test("rewrites the exact line", () => {
    assert.deepEqual(
      sharpenOutput(["[sdl]", "output=opengl", "fullscreen=true"]),
      ["[sdl]", "output=openglnb", "fullscreen=true"]
    );
  });

  test("keeps the CR of a CRLF line", () => {
    assert.deepEqual(sharpenOutput(["output=opengl\r"]), ["output=openglnb\r"]);
  });

  /**
   * Only a full-line match counts.
   */
  test("leaves lines that merely contain the text", () => {
    const lines = ["output=openglnb", "#output=opengl", "output=opengl # comment", " output=opengl"];
    assert.deepEqual(sharpenOutput(lines), lines);
  });

  test("hasBilinearOutput detects only the exact line", () => {
    assert.equal(hasBilinearOutput(["output=opengl"]), true);
    assert.equal(hasBilinearOutput(["output=openglnb", "output=surface"]), false);
  });
});

// ─── redirectCdImage ──────────────────────────────────────────────────────────

describe("redirectCdImage — game.gog → game.ins", () => {
  test("replaces every occurrence", () => {
    assert.deepEqual(
      redirectCdImage(['imgmount d "./game.gog" -t iso', "rem game.gog game.gog"]),
      ['imgmount d "./game.ins" -t iso', "rem game.ins game.ins"]
    );
  });
});

// ─── fixMountPaths ────────────────────────────────────────────────────────────

describe("fixMountPaths — flattened layout", () => {
  test('mount c "data" → mount C "."', () => {
    assert.deepEqual(fixMountPaths(['mount c "data"']), ['mount C "."']);
  });

  test('mount C ".." → mount C "."', () => {
    assert.deepEqual(fixMountPaths(['mount C ".."']), ['mount C "."']);
  });

  test('"data/SOUND" → "./SOUND"', () => {
    assert.deepEqual(
      fixMountPaths(['mount d "data/SOUND" -t cdrom']),
      ['mount d "./SOUND" -t cdrom']
    );
  });

  test("other drive letters and paths are untouched", () => {
    const lines = ['mount d "data"', 'mount c "game"', "data/unquoted"];
    assert.deepEqual(fixMountPaths(lines), lines);
  });

  test("options after the path are preserved", () => {
    assert.deepEqual(
      fixMountPaths(['mount c "data" -freesize 100']),
      ['mount C "." -freesize 100']
    );
  });
});

// ─── patchAutoexec ────────────────────────────────────────────────────────────

const GOG_AUTOEXEC = splitLines(
  [
    "[autoexec]",
    "@echo off",
    'mount c "data"',
    'imgmount d "data/game.gog" -t iso -fs iso',
    "c:",
    "GAME.EXE",
    "exit",
    "",
  ].join("\n")
);

describe("patchAutoexec", () => {
  test("redirects the CD image when game.ins is available", () => {
    const { lines, cdAudioFixed } = patchAutoexec(GOG_AUTOEXEC, true);
    assert.equal(cdAudioFixed, true);
    assert.equal(lines[2], 'mount C "."');
    assert.equal(lines[3], 'imgmount d "./game.ins" -t iso -fs iso');
    assert.ok(!joinLines(lines).includes("game.gog"));
  });

  test("leaves the CD image alone without game.ins", () => {
    const { lines, cdAudioFixed } = patchAutoexec(GOG_AUTOEXEC, false);
    assert.equal(cdAudioFixed, false);
    assert.equal(lines[3], 'imgmount d "./game.gog" -t iso -fs iso');
  });

  test("reports no CD fix when nothing references game.gog", () => {
    const { cdAudioFixed } = patchAutoexec(["[autoexec]", "GAME.EXE"], true);
    assert.equal(cdAudioFixed, false);
  });

  /**
   * Re-running over already-patched content must change nothing.
   */
  test("is idempotent", () => {
    const once = patchAutoexec(GOG_AUTOEXEC, true).lines;
    const twice = patchAutoexec(once, true);
    assert.deepEqual(twice.lines, once);
    assert.equal(twice.cdAudioFixed, false);
  });

  test("does not mutate its input", () => {
    const input = ['mount c "data"'];
    patchAutoexec(input, true);
    assert.deepEqual(input, ['mount c "data"']);
  });
});
