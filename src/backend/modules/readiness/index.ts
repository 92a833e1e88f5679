// Re-export all types
export type {
  VersionDiff,
  VersionDiffStatus,
  DiffOf,
  SelectedRunner,
  GameLocation,
  StatusUpdate,
  StatusListener,
  CheckContext,
  PatchDescriptor,
  LaunchReadinessState,
  LaunchReadinessKind,
  GameVersionProvider,
  PatchRepository,
  TelemetryProbe,
  PatchCheckInput,
  PatchCheck,
  PathLayout,
  GameProfile,
  MirrorFailure,
  PatchSyncOutcome,
  ResolverDiagnostics,
  ResolverResult,
} from "./types.js";

// Re-export resolver
export {
  LaunchReadinessResolver,
  notifyStatus,
  TELEMETRY_CHECK_TIMEOUT_MS,
  PATCH_FETCH_TIMEOUT_MS,
  type ResolverOptions,
} from "./resolver.js";

// Re-export patch sync and checks
export { syncPatchFolder } from "./patch-sync.js";
export {
  appliedPatchCheck,
  verifiedPatchCheck,
  isVersionNewer,
  installedGameVersion,
  type AppliedPatchSource,
  type AppliedPatchCheckOptions,
  type PatchStatus,
  type PatchMetadata,
  type VerifiedPatchSource,
} from "./patches.js";

export { withTimeout, TimeoutError, errorMessage } from "./timeout.js";
