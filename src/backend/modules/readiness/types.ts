/**
 * Shared types for the readiness module: the version diffs consumed from
 * external providers, the check context, the closed set of readiness states
 * and the Game Profile capability set the resolver is generic over.
 */
import type { RuntimeEnvironment } from "../steam/environment.js";

// ---------------------------------------------------------------------------
// Version diffs (produced by the Game Version Provider)
// ---------------------------------------------------------------------------

export type VersionDiff =
  | { status: "latest"; version: string }
  | { status: "predownload"; current: string; latest: string }
  | { status: "diff"; current: string; latest: string }
  | { status: "outdated"; current: string; latest: string }
  | { status: "notInstalled"; latest: string };

export type VersionDiffStatus = VersionDiff["status"];

export type DiffOf<S extends VersionDiffStatus> = Extract<VersionDiff, { status: S }>;

// ---------------------------------------------------------------------------
// Check context
// ---------------------------------------------------------------------------

export interface SelectedRunner {
  readonly name: string;
  /** Prefix lifecycle owned externally (Steam Proton) */
  readonly managed: boolean;
}

export interface GameLocation {
  readonly path: string;
  readonly edition: string;
}

export type StatusUpdate =
  | { stage: "game" }
  | { stage: "voice"; locale: string }
  | { stage: "patch" }
  | { stage: "telemetry" };

/** Observational only; the resolver never waits for it. */
export type StatusListener = (update: StatusUpdate) => void | Promise<void>;

/** Read-only snapshot assembled right before a resolution call. */
export interface CheckContext {
  readonly winePrefix: string;
  readonly runner: SelectedRunner | null;
  readonly game: GameLocation;
  /** Voice locales in selection order, e.g. "en-us" */
  readonly voices: ReadonlyArray<string>;
  readonly patch: {
    readonly servers: ReadonlyArray<string>;
    readonly folder: string;
  };
  /** Per-game switches keyed by patch toggle name, e.g. { xlua: true } */
  readonly toggles: Readonly<Record<string, boolean>>;
  readonly ignoreTelemetry: boolean;
  readonly onStatus?: StatusListener;
}

// ---------------------------------------------------------------------------
// Readiness states
// ---------------------------------------------------------------------------

export interface PatchDescriptor {
  id: string;
  title: string;
  version: string | null;
}

export type LaunchReadinessState =
  | { kind: "Launch" }
  | {
      kind: "PredownloadAvailable";
      game: DiffOf<"predownload">;
      voices: DiffOf<"predownload">[];
    }
  | { kind: "WineNotInstalled" }
  | { kind: "PrefixNotExists" }
  | { kind: "GameNotInstalled"; diff: DiffOf<"notInstalled"> }
  | { kind: "GameOutdated"; diff: DiffOf<"outdated"> }
  | { kind: "GameUpdateAvailable"; diff: DiffOf<"diff"> }
  | { kind: "VoiceNotInstalled"; locale: string; diff: DiffOf<"notInstalled"> }
  | { kind: "VoiceOutdated"; locale: string; diff: DiffOf<"outdated"> }
  | { kind: "VoiceUpdateAvailable"; locale: string; diff: DiffOf<"diff"> }
  | { kind: "PatchAvailable"; patch: PatchDescriptor }
  | { kind: "PatchNotInstalled" }
  | { kind: "PatchUpdateAvailable"; current: string; latest: string }
  | { kind: "PatchNotVerified" }
  | { kind: "PatchBroken" }
  | { kind: "PatchUnsafe" }
  | { kind: "PatchConcerning" }
  | { kind: "TelemetryNotDisabled" };

export type LaunchReadinessKind = LaunchReadinessState["kind"];

// ---------------------------------------------------------------------------
// External providers
// ---------------------------------------------------------------------------

export interface GameVersionProvider {
  gameDiff(game: GameLocation): Promise<VersionDiff>;
  voiceDiff(game: GameLocation, locale: string): Promise<VersionDiff>;
}

/** Local patch cache kept in sync with a list of mirrors. */
export interface PatchRepository {
  isSynced(folder: string, servers: ReadonlyArray<string>): Promise<boolean>;
  /**
   * Syncs `folder` from one mirror. `signal` aborts when the attempt timed
   * out; the returned promise must still settle once the folder is no longer
   * being written.
   */
  sync(folder: string, server: string, signal: AbortSignal): Promise<void>;
}

export interface TelemetryProbe {
  /** First telemetry domain that still resolves, or null when all are blocked */
  resolveDomains(edition: string): Promise<string | null>;
}

export interface PatchCheckInput {
  context: CheckContext;
  /** The game diff that let the resolver reach the patch stage */
  gameDiff: DiffOf<"latest" | "predownload">;
}

/** One game-specific patch condition; null means satisfied. */
export interface PatchCheck {
  id: string;
  run(input: PatchCheckInput): Promise<LaunchReadinessState | null>;
}

export interface PathLayout {
  /** Default install folder of an edition under `baseDir` */
  defaultGamePath(edition: string, environment: RuntimeEnvironment, baseDir: string): string;
}

/** Everything that differs between supported games. */
export interface GameProfile {
  id: string;
  title: string;
  editions: ReadonlyArray<string>;
  versions: GameVersionProvider;
  /** Null when the game has no patch mirrors to sync */
  patches: PatchRepository | null;
  patchChecks: ReadonlyArray<PatchCheck>;
  /** Null when the game has no telemetry domains to probe */
  telemetry: TelemetryProbe | null;
  pathLayout: PathLayout;
}

// ---------------------------------------------------------------------------
// Diagnostics (side channel; never changes the resolved state)
// ---------------------------------------------------------------------------

export interface MirrorFailure {
  server: string;
  error: string;
}

export interface PatchSyncOutcome {
  status: "in-sync" | "synced" | "exhausted";
  /** Mirror the folder was synced from */
  server: string | null;
  failures: MirrorFailure[];
}

export interface ResolverDiagnostics {
  patchSync: PatchSyncOutcome | null;
  /** Set when the telemetry probe failed and telemetry was assumed disabled */
  telemetryProbeError: string | null;
}

export interface ResolverResult {
  state: LaunchReadinessState;
  diagnostics: ResolverDiagnostics;
}
