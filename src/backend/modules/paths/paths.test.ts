/**
 * paths.test.ts — Unit tests for the launcher directory layout
 *
 * Every function takes the environment map explicitly, so these tests never
 * read or modify process.env.
 */

import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { baseInstallDir, cacheDir, launcherDir, settingsFile } from "./index.js";
import { makeEnvironment } from "../../../tests/helpers/index.js";

describe("launcherDir", () => {
  it("prefers LAUNCHER_FOLDER", () => {
    assert.equal(
      launcherDir({ LAUNCHER_FOLDER: "/opt/wcl", XDG_DATA_HOME: "/xdg", HOME: "/home/u" }),
      "/opt/wcl"
    );
  });

  it("falls back to XDG_DATA_HOME", () => {
    assert.equal(launcherDir({ XDG_DATA_HOME: "/xdg", HOME: "/home/u" }), "/xdg/wincompat-launcher");
  });

  it("falls back to ~/.local/share", () => {
    assert.equal(launcherDir({ HOME: "/home/u" }), "/home/u/.local/share/wincompat-launcher");
  });

  it("accepts another folder name", () => {
    assert.equal(launcherDir({ HOME: "/home/u" }, "other"), "/home/u/.local/share/other");
  });

  it("throws when nothing is set", () => {
    assert.throws(() => launcherDir({}), /HOME/);
  });
});

describe("cacheDir", () => {
  it("prefers CACHE_FOLDER", () => {
    assert.equal(cacheDir({ CACHE_FOLDER: "/var/cache/wcl", HOME: "/home/u" }), "/var/cache/wcl");
  });

  it("falls back to XDG_CACHE_HOME", () => {
    assert.equal(cacheDir({ XDG_CACHE_HOME: "/xdg-cache" }), "/xdg-cache/wincompat-launcher");
  });

  it("falls back to ~/.cache", () => {
    assert.equal(cacheDir({ HOME: "/home/u" }), "/home/u/.cache/wincompat-launcher");
  });
});

describe("settingsFile", () => {
  it("lives in the launcher folder", () => {
    assert.equal(settingsFile("/opt/wcl"), "/opt/wcl/settings.json");
  });
});

describe("baseInstallDir", () => {
  it("is the launcher folder outside Steam", () => {
    assert.equal(baseInstallDir(makeEnvironment(), "/opt/wcl"), "/opt/wcl");
  });

  it("is Steam's prefix C: drive under Steam", () => {
    const env = makeEnvironment({
      kind: "deck",
      launchedFromSteam: true,
      steamDeck: true,
      compatDataPath: "/steam/compatdata/42",
    });
    assert.equal(baseInstallDir(env, "/opt/wcl"), "/steam/compatdata/42/pfx/drive_c");
  });

  it("is the launcher folder under Steam without a compat data path", () => {
    const env = makeEnvironment({ kind: "desktop", launchedFromSteam: true });
    assert.equal(baseInstallDir(env, "/opt/wcl"), "/opt/wcl");
  });
});
