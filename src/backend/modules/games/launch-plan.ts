import { NotFoundError } from "../../errors.js";
import {
  buildLaunchEnv,
  renderLaunchCommand,
  type Features,
  type TemplateVars,
} from "../components/index.js";
import { basePrefix, selectRunner, winePrefixFor, type AssemblyDeps } from "./context.js";
import type { GameEntry } from "./types.js";

export interface LaunchPlan {
  runner: {
    group: string;
    version: string;
    dir: string;
    managed: boolean;
  };
  features: Features;
  /** Value of %prefix% */
  prefix: string;
  /** Wine prefix the runner uses */
  winePrefix: string;
  /** Rendered `command` feature; null = run the runner's wine binary directly */
  command: string | null;
  env: Record<string, string>;
}

export interface LaunchPlanDeps extends AssemblyDeps {
  tempPath: string;
  launcherPath: string;
}

/**
 * Everything needed to start the game with its selected runner: effective
 * features, the rendered command and the launch environment.
 *
 * Throws NotFoundError when the entry has no usable runner.
 */
export async function buildLaunchPlan(
  entry: GameEntry,
  deps: LaunchPlanDeps,
  inherited: NodeJS.ProcessEnv = process.env
): Promise<LaunchPlan> {
  const selection = await selectRunner(entry, deps);
  if (!selection) {
    throw new NotFoundError(
      entry.runner ?? "runner",
      entry.runner
        ? `Runner "${entry.runner}" is not installed`
        : `Game "${entry.id}" has no runner selected`
    );
  }

  const prefix = basePrefix(entry, selection, deps.environment);
  const vars: TemplateVars = {
    build: selection.dir,
    prefix,
    temp: deps.tempPath,
    launcher: deps.launcherPath,
    game: entry.gamePath,
  };

  const { group, version } = selection.match;

  return {
    runner: { group: group.name, version: version.name, dir: selection.dir, managed: version.managed },
    features: selection.features,
    prefix,
    winePrefix: winePrefixFor(entry, selection, deps.environment),
    command: renderLaunchCommand(selection.features, vars),
    env: buildLaunchEnv(selection.features, vars, { inherited }),
  };
}
