/**
 * ============================================================
 *  discovery — Unit Tests
 * ============================================================
 *
 * Builds a fake Steam install under the OS temp folder:
 *
 *   <root>/compatibilitytools.d/GE-Proton9-20/       proton + version
 *   <root>/steamapps/common/Proton 9.0/             proton + version
 *   <root>/steamapps/common/Proton 8.0/             proton + version
 *   <root>/steamapps/common/Broken/                 version without a name
 *   <root>/steamapps/common/NoVersion/              proton only
 *   <root>/steamapps/common/Proton Link  →  Proton 9.0 (symlink)
 *   <root>/steamapps/common/SomeGame/               no proton script
 *   <lib2>/steamapps/common/Proton 7.0/             second library
 *
 * Module under test: src/backend/modules/steam/discovery.ts
 * Suite entry:       src/tests/suite.ts
 * ============================================================
 */
import { test, describe, before, after } from "node:test";
import assert from "node:assert/strict";
import { symlinkSync } from "fs";
import { join } from "path";
import {
  SteamRuntimeDiscovery,
  STEAM_PROTON_GROUP,
  isProtonDirectory,
  parseVersionFile,
  protonSortKey,
  steamProtonFeatures,
} from "./discovery.js";
import { makeEnvironment, makeTempDir, removeDir, writeText } from "../../../tests/helpers/index.js";

// ─── parseVersionFile ─────────────────────────────────────────────────────────

describe("parseVersionFile", () => {
  test("splits build id and name on the space", () => {
    assert.deepEqual(parseVersionFile("1695908143 proton-8.0-4\n"), {
      buildId: "1695908143",
      name: "proton-8.0-4",
    });
  });

  test("takes only the second token as the name", () => {
    assert.deepEqual(parseVersionFile("1695908143 proton-8.0-4 extra"), {
      buildId: "1695908143",
      name: "proton-8.0-4",
    });
  });

  test("null without a name", () => {
    assert.equal(parseVersionFile("1695908143\n"), null);
    assert.equal(parseVersionFile("1695908143 \n"), null);
  });

  test("null without a build id", () => {
    assert.equal(parseVersionFile(" proton-8.0-4"), null);
  });

  test("null for an empty file", () => {
    assert.equal(parseVersionFile(""), null);
  });
});

// ─── protonSortKey ────────────────────────────────────────────────────────────

describe("protonSortKey — newest first", () => {
  test("'proton-9.0-1' → 9000", () => {
    assert.equal(protonSortKey("proton-9.0-1"), 9000);
  });

  test("'GE-Proton9-20' → 9020", () => {
    assert.equal(protonSortKey("GE-Proton9-20"), 9020);
  });

  test("'proton_8' → 8000", () => {
    assert.equal(protonSortKey("proton_8"), 8000);
  });

  test("'experimental' → 0", () => {
    assert.equal(protonSortKey("experimental"), 0);
  });
});

// ─── steamProtonFeatures ──────────────────────────────────────────────────────

describe("steamProtonFeatures", () => {
  test("runs the proton script with a pfx prefix sub-folder", () => {
    assert.deepEqual(steamProtonFeatures("/steam"), {
      bundle: "Proton",
      needDxvk: false,
      compactLaunch: true,
      prefixSubdir: "pfx",
      command: "python3 '%build%/proton' waitforexitandrun",
      env: {
        STEAM_COMPAT_DATA_PATH: "%prefix%",
        STEAM_COMPAT_CLIENT_INSTALL_PATH: "/steam",
        SteamAppId: "0",
      },
    });
  });

  test("client install path is empty without a Steam root", () => {
    assert.equal(steamProtonFeatures(null).env.STEAM_COMPAT_CLIENT_INSTALL_PATH, "");
  });
});

// ─── Discovery against a fake Steam install ───────────────────────────────────

describe("SteamRuntimeDiscovery", () => {
  let root: string;
  let lib2: string;
  const common = () => join(root, "steamapps", "common");

  function protonBuild(dir: string, version: string | null): void {
    writeText(join(dir, "proton"), "#!/usr/bin/env python3\n");
    if (version !== null) writeText(join(dir, "version"), version);
  }

  before(() => {
    root = makeTempDir("wcl-steam-root-");
    lib2 = makeTempDir("wcl-steam-lib-");

    protonBuild(join(root, "compatibilitytools.d", "GE-Proton9-20"), "1700000000 GE-Proton9-20\n");
    protonBuild(join(common(), "Proton 9.0"), "1695908143 proton-9.0-1\n");
    protonBuild(join(common(), "Proton 8.0"), "1690000000 proton-8.0-5\n");
    protonBuild(join(common(), "Broken"), "1695908143\n");
    protonBuild(join(common(), "NoVersion"), null);
    symlinkSync(join(common(), "Proton 9.0"), join(common(), "Proton Link"), "dir");
    writeText(join(common(), "SomeGame", "game.exe"), "");
    protonBuild(join(lib2, "steamapps", "common", "Proton 7.0"), "1600000000 proton-7.0-6\n");

    writeText(
      join(root, "steamapps", "libraryfolders.vdf"),
      `"libraryfolders"\n{\n\t"0" { "path" "${root}" }\n\t"1" { "path" "${lib2}" }\n}\n`
    );
  });

  after(() => {
    removeDir(root);
    removeDir(lib2);
  });

  function discovery(launchedFromSteam: boolean, roots?: string[]): SteamRuntimeDiscovery {
    return new SteamRuntimeDiscovery({
      environment: makeEnvironment({ launchedFromSteam, kind: launchedFromSteam ? "desktop" : "independent" }),
      steamRoots: roots ?? [join(root, "missing"), root],
    });
  }

  test("isProtonDirectory rejects symlinks and folders without proton", () => {
    assert.equal(isProtonDirectory(join(common(), "Proton 9.0")), true);
    assert.equal(isProtonDirectory(join(common(), "Proton Link")), false);
    assert.equal(isProtonDirectory(join(common(), "SomeGame")), false);
    assert.equal(isProtonDirectory(join(common(), "Nothing")), false);
  });

  test("locateSteamRoot returns the first existing root", () => {
    assert.equal(discovery(true).locateSteamRoot(), root);
  });

  test("searches compatibilitytools.d, then every library", () => {
    assert.deepEqual(discovery(true).searchRoots(root), [
      join(root, "compatibilitytools.d"),
      join(root, "steamapps", "common"),
      join(lib2, "steamapps", "common"),
    ]);
  });

  test("installedProtonPaths lists real proton folders in discovery order", () => {
    assert.deepEqual(discovery(true).installedProtonPaths(), [
      join(root, "compatibilitytools.d", "GE-Proton9-20"),
      join(common(), "Broken"),
      join(common(), "NoVersion"),
      join(common(), "Proton 8.0"),
      join(common(), "Proton 9.0"),
      join(lib2, "steamapps", "common", "Proton 7.0"),
    ]);
  });

  test("installedProtonPaths is null outside Steam", () => {
    assert.equal(discovery(false).installedProtonPaths(), null);
  });

  test("installedProtonPaths is null when Steam cannot be found", () => {
    assert.equal(discovery(true, [join(root, "missing")]).installedProtonPaths(), null);
  });

  test("synthesises one managed group, newest build first", async () => {
    const groups = await discovery(true).discoverProtonInstalls();

    assert.equal(groups.length, 1);
    const [group] = groups;
    assert.equal(group.name, STEAM_PROTON_GROUP);
    assert.equal(group.title, "Proton Runners via Steam");
    assert.equal(group.managed, true);
    assert.deepEqual(group.features, steamProtonFeatures(root));
    assert.deepEqual(
      group.versions.map((v) => v.name),
      ["GE-Proton9-20", "proton-9.0-1", "proton-8.0-5", "proton-7.0-6"]
    );
  });

  test("versions point at their build folder", async () => {
    const [group] = await discovery(true).discoverProtonInstalls();
    const proton9 = group.versions[1];

    assert.equal(proton9.title, "Proton 9.0");
    assert.equal(proton9.uri, join(common(), "Proton 9.0"));
    assert.equal(proton9.managed, true);
    assert.equal(proton9.features, null);
    assert.deepEqual(proton9.files, {
      wine: "files/bin/wine",
      wine64: "files/bin/wine64",
      wineserver: "files/bin/wineserver",
      wineboot: null,
      winecfg: "files/lib64/wine/x86_64-windows/winecfg.exe",
    });
  });

  test("discovers builds outside Steam mode too", async () => {
    const [group] = await discovery(false).discoverProtonInstalls();
    assert.equal(group.versions.length, 4);
  });

  test("throws DiscoveryError in Steam mode without a Steam install", async () => {
    await assert.rejects(discovery(true, [join(root, "missing")]).discoverProtonInstalls(), {
      name: "DiscoveryError",
      code: "DISCOVERY",
    });
  });

  test("an unreadable search root is skipped, the others are still scanned", async () => {
    class UnreadableToolsDiscovery extends SteamRuntimeDiscovery {
      protected readEntries(dir: string): string[] {
        if (dir === join(root, "compatibilitytools.d")) {
          throw Object.assign(new Error(`EACCES: permission denied, scandir '${dir}'`), { code: "EACCES" });
        }
        return super.readEntries(dir);
      }
    }

    const scan = new UnreadableToolsDiscovery({
      environment: makeEnvironment({ launchedFromSteam: true, kind: "desktop" }),
      steamRoots: [root],
    });
    const [group] = await scan.discoverProtonInstalls();

    assert.deepEqual(
      group.versions.map((v) => v.name),
      ["proton-9.0-1", "proton-8.0-5", "proton-7.0-6"]
    );
  });

  test("returns an empty group outside Steam mode without a Steam install", async () => {
    const [group] = await discovery(false, [join(root, "missing")]).discoverProtonInstalls();
    assert.deepEqual(group.versions, []);
    assert.equal(group.features?.env.STEAM_COMPAT_CLIENT_INSTALL_PATH, "");
  });
});
