import { logger } from "../../logger.js";
import { errorMessage, TimeoutError, withTimeout } from "./timeout.js";
import type { MirrorFailure, PatchRepository, PatchSyncOutcome } from "./types.js";

const log = logger.child({ module: "readiness" });

/**
 * Brings the local patch folder in sync with the first mirror that answers.
 *
 * Mirrors are tried strictly in order and the loop stops at the first
 * success. Failed mirrors never surface as errors: they are only listed in
 * the outcome, and an "exhausted" outcome still lets the caller continue
 * with whatever the local folder already holds.
 *
 * A mirror that exceeds `timeoutMs` is aborted through its signal, and the
 * next mirror only starts once that attempt has settled. An attempt that
 * still completes after the abort counts as a success.
 *
 * Errors from `isSynced` itself are propagated.
 */
export async function syncPatchFolder(
  repository: PatchRepository,
  folder: string,
  servers: ReadonlyArray<string>,
  timeoutMs: number
): Promise<PatchSyncOutcome> {
  if (await repository.isSynced(folder, servers)) {
    return { status: "in-sync", server: null, failures: [] };
  }

  const failures: MirrorFailure[] = [];

  for (const server of servers) {
    const controller = new AbortController();
    const attempt = repository.sync(folder, server, controller.signal);

    try {
      await withTimeout(attempt, timeoutMs, `Patch sync from ${server}`);
      log.debug({ server, failed: failures.length }, "Patch folder synced");
      return { status: "synced", server, failures };
    } catch (err) {
      if (err instanceof TimeoutError) {
        controller.abort(err);
        if (await settled(attempt, server)) {
          log.debug({ server, failed: failures.length }, "Patch folder synced after the timeout");
          return { status: "synced", server, failures };
        }
      }
      log.debug({ server, err }, "Patch mirror failed, trying the next one");
      failures.push({ server, error: errorMessage(err) });
    }
  }

  log.warn({ folder, mirrors: servers.length }, "Every patch mirror failed, using the local patch folder as is");
  return { status: "exhausted", server: null, failures };
}

/** Waits for an aborted attempt to finish; true when it completed anyway. */
async function settled(attempt: Promise<void>, server: string): Promise<boolean> {
  try {
    await attempt;
    return true;
  } catch (err) {
    log.debug({ server, err }, "Aborted patch sync settled");
    return false;
  }
}
