/**
 * ============================================================
 *  materializer copy — Unit Tests
 * ============================================================
 *
 * Module under test: src/modules/materializer/copy.ts
 * Suite entry:       src/tests/suite.ts
 *
 * Windows denylist (top level only):
 *   __support, __redist, DOSBOX, app, commonappdata, tmp,
 *   goggame-*, *.bin
 * ============================================================
 */
import { test, describe, after } from "node:test";
import assert from "node:assert/strict";
import { existsSync, readdirSync, readFileSync, readlinkSync, rmSync, symlinkSync } from "fs";
import { join } from "path";
import { isInstallerArtifact, copyGameData, copyGameConfigs } from "./copy.js";
import { makeTempDir, removeTempDirs, writeTree } from "../../tests/helpers/index.js";

after(removeTempDirs);

describe("isInstallerArtifact", () => {
  test("denylisted directory names", () => {
    for (const name of ["__support", "__redist", "DOSBOX", "app", "commonappdata", "tmp"]) {
      assert.equal(isInstallerArtifact(name), true, name);
    }
  });

  test("goggame- metadata and .bin files", () => {
    assert.equal(isInstallerArtifact("goggame-1207658944.info"), true);
    assert.equal(isInstallerArtifact("setup_game-1.bin"), true);
  });

  /**
   * Names are matched exactly, so case variants are game files.
   */
  test("game files and case variants are kept", () => {
    for (const name of ["GAME.EXE", "STATIC", "App", "dosbox", "game.gog", "game.ins"]) {
      assert.equal(isInstallerArtifact(name), false, name);
    }
  });
});

describe("copyGameData", () => {
  test("linux: copies everything recursively", () => {
    const src = makeTempDir();
    const out = makeTempDir();
    writeTree(src, { "GAME.EXE": "MZ", "SOUND/MUSIC.XMI": "xmi", "tmp/keep.txt": "k" });
    const copied = copyGameData(src, out, "linuxArchive");
    assert.deepEqual(copied, ["GAME.EXE", "SOUND", "tmp"]);
    assert.equal(readFileSync(join(out, "SOUND/MUSIC.XMI"), "utf-8"), "xmi");
  });

  test("windows: skips installer artifacts", () => {
    const src = makeTempDir();
    const out = makeTempDir();
    writeTree(src, {
      "GAME.EXE": "MZ",
      "U7.CFG": "cfg",
      "__support/app/dosbox.conf": "",
      "__redist/": "",
      "goggame-1.info": "{}",
      "setup-1.bin": "",
      "DOSBOX/dosbox.exe": "",
    });
    copyGameData(src, out, "windowsPackage");
    assert.deepEqual(readdirSync(out).sort(), ["GAME.EXE", "U7.CFG"]);
  });

  test("keeps relative symlink targets as written", () => {
    const src = makeTempDir();
    const out = makeTempDir();
    writeTree(src, { "GAME.DAT": "data", "MUSIC/TRACK01.OGG": "ogg" });
    symlinkSync("GAME.DAT", join(src, "game.lnk"));
    symlinkSync("TRACK01.OGG", join(src, "MUSIC/track1.ogg"));

    copyGameData(src, out, "linuxArchive");
    rmSync(src, { recursive: true, force: true });

    assert.equal(readlinkSync(join(out, "game.lnk")), "GAME.DAT");
    assert.equal(readlinkSync(join(out, "MUSIC/track1.ogg")), "TRACK01.OGG");
    assert.equal(readFileSync(join(out, "game.lnk"), "utf-8"), "data");
    assert.equal(readFileSync(join(out, "MUSIC/track1.ogg"), "utf-8"), "ogg");
  });

  test("skips hidden entries", () => {
    const src = makeTempDir();
    const out = makeTempDir();
    writeTree(src, { ".DS_Store": "", "GAME.EXE": "MZ" });
    copyGameData(src, out, "linuxArchive");
    assert.equal(existsSync(join(out, ".DS_Store")), false);
  });

  test("overwrites files from an earlier run", () => {
    const src = makeTempDir();
    const out = makeTempDir();
    writeTree(src, { "GAME.EXE": "new" });
    writeTree(out, { "GAME.EXE": "old" });
    copyGameData(src, out, "linuxArchive");
    assert.equal(readFileSync(join(out, "GAME.EXE"), "utf-8"), "new");
  });
});

describe("copyGameConfigs", () => {
  test("copies .CFG and .cfg, skipping dosbox*", () => {
    const root = makeTempDir();
    const out = makeTempDir();
    writeTree(root, {
      "U7.CFG": "a",
      "sound.cfg": "b",
      "dosbox_u7.cfg": "c",
      "dosbox.conf": "d",
      "setup.Cfg": "e",
    });
    assert.deepEqual(copyGameConfigs(root, out), ["U7.CFG", "sound.cfg"]);
    assert.deepEqual(readdirSync(out).sort(), ["U7.CFG", "sound.cfg"]);
  });

  /**
   * The dosbox prefix check is case-sensitive.
   */
  test("DOSBOX.CFG is a game config", () => {
    const root = makeTempDir();
    const out = makeTempDir();
    writeTree(root, { "DOSBOX.CFG": "x" });
    assert.deepEqual(copyGameConfigs(root, out), ["DOSBOX.CFG"]);
  });

  test("returns an empty list when there are none", () => {
    const root = makeTempDir();
    const out = makeTempDir();
    writeTree(root, { "dosbox.conf": "" });
    assert.deepEqual(copyGameConfigs(root, out), []);
  });
});
