/**
 * library-folders.test.ts — Unit tests for libraryfolders.vdf parsing
 */

import { describe, it, beforeEach, afterEach } from "node:test";
import assert from "node:assert/strict";
import { join } from "path";
import { listLibraryFolders, parseLibraryFolders } from "./library-folders.js";
import { makeTempDir, removeDir, writeText } from "../../../tests/helpers/index.js";

const VDF = `"libraryfolders"
{
\t"0"
\t{
\t\t"path"\t\t"/home/user/.local/share/Steam"
\t\t"label"\t\t""
\t\t"apps"
\t\t{
\t\t\t"228980"\t\t"123"
\t\t}
\t}
\t"1"
\t{
\t\t"path"\t\t"/mnt/games/SteamLibrary"
\t}
}
`;

// ── parseLibraryFolders ───────────────────────────────────────────────────

describe("parseLibraryFolders", () => {
  it("reads every path entry in order", () => {
    assert.deepEqual(parseLibraryFolders(VDF), [
      "/home/user/.local/share/Steam",
      "/mnt/games/SteamLibrary",
    ]);
  });

  it("unescapes doubled backslashes", () => {
    assert.deepEqual(parseLibraryFolders('"path"\t\t"D:\\\\SteamLibrary"'), ["D:\\SteamLibrary"]);
  });

  it("drops duplicate paths", () => {
    assert.deepEqual(parseLibraryFolders('"path" "/a" "path" "/a" "path" "/b"'), ["/a", "/b"]);
  });

  it("returns nothing for a document without paths", () => {
    assert.deepEqual(parseLibraryFolders('"libraryfolders" { }'), []);
  });
});

// ── listLibraryFolders ────────────────────────────────────────────────────

describe("listLibraryFolders", () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir("wcl-steam-");
  });

  afterEach(() => {
    removeDir(root);
  });

  it("is just the root without libraryfolders.vdf", () => {
    assert.deepEqual(listLibraryFolders(root), [root]);
  });

  it("lists the root first, then the other libraries", () => {
    writeText(
      join(root, "steamapps", "libraryfolders.vdf"),
      `"libraryfolders" { "0" { "path" "/mnt/games/SteamLibrary" } "1" { "path" "${root}" } }`
    );
    assert.deepEqual(listLibraryFolders(root), [root, "/mnt/games/SteamLibrary"]);
  });
});
