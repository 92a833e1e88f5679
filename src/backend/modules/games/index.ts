export type { GameEntry } from "./types.js";

export {
  registerGameProfile,
  getGameProfile,
  listGameProfiles,
  clearGameProfiles,
} from "./profiles.js";

export {
  assembleCheckContext,
  selectRunner,
  basePrefix,
  winePrefixFor,
  type AssemblyDeps,
  type RunnerSelection,
} from "./context.js";

export { buildLaunchPlan, type LaunchPlan, type LaunchPlanDeps } from "./launch-plan.js";
