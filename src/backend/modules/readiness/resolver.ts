/**
 * ============================================================
 *  Launch Readiness Resolver
 * ============================================================
 *
 * Decides what the frontend has to offer next for one game. Checks run
 * strictly in order and the first unmet one short-circuits the rest:
 *
 *   1. runner selected                    → WineNotInstalled
 *   2. prefix has drive_c (unmanaged)     → PrefixNotExists
 *   3. game diff                          → GameNotInstalled / GameOutdated / GameUpdateAvailable
 *   4. voice diffs, in selection order    → VoiceUpdateAvailable / VoiceOutdated / VoiceNotInstalled
 *   5. patch mirror sync + profile checks → Patch* states
 *   6. telemetry domains                  → TelemetryNotDisabled
 *   7. predownload pending                → PredownloadAvailable, else Launch
 *
 * Provider calls are awaited one at a time; nothing runs in parallel and a
 * later check is never started before the earlier ones passed. The resolver
 * keeps no state between calls.
 * ============================================================
 */
import { join } from "path";
import { logger } from "../../logger.js";
import { isDirectory } from "../components/registry.js";
import { syncPatchFolder } from "./patch-sync.js";
import { errorMessage, withTimeout } from "./timeout.js";
import type {
  CheckContext,
  DiffOf,
  GameProfile,
  LaunchReadinessState,
  ResolverDiagnostics,
  ResolverResult,
  StatusUpdate,
} from "./types.js";

const log = logger.child({ module: "readiness" });

export const TELEMETRY_CHECK_TIMEOUT_MS = 3_000;
export const PATCH_FETCH_TIMEOUT_MS = 5_000;

export interface ResolverOptions {
  /** Per telemetry probe call */
  telemetryTimeoutMs?: number;
  /** Per patch mirror sync call */
  patchSyncTimeoutMs?: number;
}

/**
 * Invokes the status listener without letting it block or fail the resolver.
 */
export function notifyStatus(context: CheckContext, update: StatusUpdate): void {
  const listener = context.onStatus;
  if (!listener) return;

  try {
    const result = listener(update);
    if (result instanceof Promise) {
      result.catch((err: unknown) => log.warn({ err, update }, "Status listener rejected"));
    }
  } catch (err) {
    log.warn({ err, update }, "Status listener threw");
  }
}

export class LaunchReadinessResolver {
  private readonly telemetryTimeoutMs: number;
  private readonly patchSyncTimeoutMs: number;

  constructor(
    private readonly profile: GameProfile,
    options: ResolverOptions = {}
  ) {
    this.telemetryTimeoutMs = options.telemetryTimeoutMs ?? TELEMETRY_CHECK_TIMEOUT_MS;
    this.patchSyncTimeoutMs = options.patchSyncTimeoutMs ?? PATCH_FETCH_TIMEOUT_MS;
  }

  /** Resolves the readiness state for one context. */
  async resolve(context: CheckContext): Promise<LaunchReadinessState> {
    return (await this.resolveWithDiagnostics(context)).state;
  }

  /**
   * Same as resolve(), plus what happened along the way that the state
   * itself does not show (failed patch mirrors, a failed telemetry probe).
   */
  async resolveWithDiagnostics(context: CheckContext): Promise<ResolverResult> {
    const diagnostics: ResolverDiagnostics = { patchSync: null, telemetryProbeError: null };
    const state = await this.evaluate(context, diagnostics);

    log.debug(
      { profile: this.profile.id, edition: context.game.edition, state: state.kind },
      "Launch readiness resolved"
    );

    return { state, diagnostics };
  }

  private async evaluate(
    context: CheckContext,
    diagnostics: ResolverDiagnostics
  ): Promise<LaunchReadinessState> {
    // 1. Runner
    const runner = context.runner;
    if (!runner) return { kind: "WineNotInstalled" };

    // 2. Prefix; managed runners own their prefix lifecycle
    if (!runner.managed && !isDirectory(join(context.winePrefix, "drive_c"))) {
      return { kind: "PrefixNotExists" };
    }

    // 3. Game
    notifyStatus(context, { stage: "game" });
    const gameDiff = await this.profile.versions.gameDiff(context.game);

    switch (gameDiff.status) {
      case "notInstalled":
        return { kind: "GameNotInstalled", diff: gameDiff };
      case "outdated":
        return { kind: "GameOutdated", diff: gameDiff };
      case "diff":
        return { kind: "GameUpdateAvailable", diff: gameDiff };
      case "latest":
      case "predownload":
        break;
    }

    // 4. Voices
    const predownloadVoices: DiffOf<"predownload">[] = [];

    for (const locale of context.voices) {
      notifyStatus(context, { stage: "voice", locale });
      const diff = await this.profile.versions.voiceDiff(context.game, locale);

      switch (diff.status) {
        case "latest":
          break;
        case "predownload":
          predownloadVoices.push(diff);
          break;
        case "diff":
          return { kind: "VoiceUpdateAvailable", locale, diff };
        case "outdated":
          return { kind: "VoiceOutdated", locale, diff };
        case "notInstalled":
          return { kind: "VoiceNotInstalled", locale, diff };
      }
    }

    // 5. Patches
    notifyStatus(context, { stage: "patch" });

    if (this.profile.patches) {
      diagnostics.patchSync = await syncPatchFolder(
        this.profile.patches,
        context.patch.folder,
        context.patch.servers,
        this.patchSyncTimeoutMs
      );
    }

    for (const check of this.profile.patchChecks) {
      const unmet = await check.run({ context, gameDiff });
      if (unmet) {
        log.debug({ check: check.id, state: unmet.kind }, "Patch check not satisfied");
        return unmet;
      }
    }

    // 6. Telemetry
    if (this.profile.telemetry && !context.ignoreTelemetry) {
      notifyStatus(context, { stage: "telemetry" });

      let disabled: boolean;
      try {
        const resolved = await withTimeout(
          this.profile.telemetry.resolveDomains(context.game.edition),
          this.telemetryTimeoutMs,
          "Telemetry check"
        );
        disabled = resolved === null;
      } catch (err) {
        log.warn({ err }, "Failed to check telemetry servers, assuming they're disabled");
        diagnostics.telemetryProbeError = errorMessage(err);
        disabled = true;
      }

      if (!disabled) return { kind: "TelemetryNotDisabled" };
    }

    // 7. Predownload or launch
    if (gameDiff.status === "predownload") {
      return { kind: "PredownloadAvailable", game: gameDiff, voices: predownloadVoices };
    }

    return { kind: "Launch" };
  }
}
