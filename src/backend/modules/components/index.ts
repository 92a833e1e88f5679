// Re-export all types
export type {
  BundleKind,
  ComponentGroup,
  ComponentKind,
  ComponentVersion,
  Features,
  TemplateVars,
  WineFiles,
} from "./types.js";

// Re-export feature resolution
export {
  defaultFeatures,
  parseFeatures,
  resolveFeatures,
  expandTemplate,
  renderLaunchCommand,
  effectivePrefix,
  buildLaunchEnv,
} from "./features.js";

// Re-export registry
export {
  ComponentRegistry,
  INDEX_FILE,
  readCatalog,
  formatFieldPath,
  isDirectory,
  isDownloaded,
  runnerDir,
  featuresFor,
  type ComponentRegistryOptions,
  type ManagedRunnerSource,
  type VersionMatch,
} from "./registry.js";
