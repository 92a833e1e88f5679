// Re-export environment detection
export {
  detectEnvironment,
  classifyEnvironment,
  defaultWindowSize,
  type EnvironmentKind,
  type RuntimeEnvironment,
  type WindowSize,
} from "./environment.js";

// Re-export library folder parsing
export { parseLibraryFolders, listLibraryFolders } from "./library-folders.js";

// Re-export discovery
export {
  SteamRuntimeDiscovery,
  DEFAULT_STEAM_ROOTS,
  STEAM_PROTON_GROUP,
  steamProtonFeatures,
  parseVersionFile,
  protonSortKey,
  isProtonDirectory,
  type ProtonVersionInfo,
  type SteamRuntimeDiscoveryOptions,
} from "./discovery.js";
