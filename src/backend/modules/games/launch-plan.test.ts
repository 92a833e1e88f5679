/**
 * launch-plan.test.ts — Unit tests for buildLaunchPlan
 *
 * Checks template expansion of the runner command and environment against
 * a temp catalog. The inherited environment is passed explicitly so the
 * host's process.env never leaks into assertions.
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { join } from "path";
import { ComponentRegistry } from "../components/index.js";
import { buildLaunchPlan, type LaunchPlanDeps } from "./launch-plan.js";
import {
  makeEnvironment,
  makeGameEntry,
  removeDir,
  steamProtonGroup,
  writeRunnerFixture,
  type RunnerFixture,
} from "../../../tests/helpers/index.js";

const INHERITED = { PATH: "/usr/bin", LANG: "C.UTF-8" };

describe("buildLaunchPlan", () => {
  let fixture: RunnerFixture;

  before(() => {
    fixture = writeRunnerFixture();
  });

  after(() => {
    removeDir(fixture.root);
  });

  function deps(overrides: Partial<LaunchPlanDeps> = {}): LaunchPlanDeps {
    return {
      registry: new ComponentRegistry(),
      environment: makeEnvironment(),
      settings: {
        componentsPath: fixture.catalog,
        runnerBuildsPath: fixture.builds,
        patchPath: "/patch",
        patchServers: [],
      },
      tempPath: "/tmp/wcl",
      launcherPath: "/launcher",
      ...overrides,
    };
  }

  it("throws NotFoundError without a selected runner", async () => {
    await assert.rejects(buildLaunchPlan(makeGameEntry(), deps(), INHERITED), {
      name: "NotFoundError",
      message: 'Game "game-1" has no runner selected',
    });
  });

  it("throws NotFoundError for a runner that is not unpacked", async () => {
    await assert.rejects(buildLaunchPlan(makeGameEntry({ runner: "ge-7-2" }), deps(), INHERITED), {
      name: "NotFoundError",
      lookup: "ge-7-2",
      message: 'Runner "ge-7-2" is not installed',
    });
  });

  it("plain wine builds run without a command", async () => {
    const plan = await buildLaunchPlan(makeGameEntry({ runner: "ge-8-1" }), deps(), INHERITED);

    assert.deepEqual(plan.runner, {
      group: "ge",
      version: "ge-8-1",
      dir: join(fixture.builds, "ge-8-1"),
      managed: false,
    });
    assert.equal(plan.command, null);
    assert.equal(plan.prefix, "/prefixes/game-1");
    assert.equal(plan.winePrefix, "/prefixes/game-1");
    assert.deepEqual(plan.env, INHERITED);
  });

  it("expands the command and env templates", async () => {
    const plan = await buildLaunchPlan(makeGameEntry({ runner: "GE-Proton9-20" }), deps(), INHERITED);
    const build = join(fixture.builds, "GE-Proton9-20");

    assert.equal(plan.command, `python3 '${build}/proton' run`);
    assert.equal(plan.prefix, "/prefixes/game-1");
    assert.equal(plan.winePrefix, "/prefixes/game-1/pfx");
    assert.deepEqual(plan.env, {
      PATH: "/usr/bin",
      LANG: "C.UTF-8",
      STEAM_COMPAT_DATA_PATH: "/prefixes/game-1",
      GAME_DIR: "/games/sample-rpg",
    });
  });

  it("Steam-managed Proton uses the compat data folder and its own path", async () => {
    const plan = await buildLaunchPlan(
      makeGameEntry({ runner: "proton-9.0-1" }),
      deps({
        registry: new ComponentRegistry({
          preferManaged: true,
          managedSource: { discoverProtonInstalls: async () => [steamProtonGroup()] },
        }),
        environment: makeEnvironment({
          kind: "desktop",
          launchedFromSteam: true,
          compatDataPath: "/steam/compatdata/1",
        }),
      }),
      {}
    );

    assert.equal(plan.runner.managed, true);
    assert.equal(plan.command, "python3 '/steam/steamapps/common/Proton 9.0/proton' waitforexitandrun");
    assert.equal(plan.winePrefix, "/steam/compatdata/1/pfx");
    assert.deepEqual(plan.env, {
      STEAM_COMPAT_DATA_PATH: "/steam/compatdata/1",
      STEAM_COMPAT_CLIENT_INSTALL_PATH: "/steam",
      SteamAppId: "0",
    });
  });
});
