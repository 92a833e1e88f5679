import type { FastifyInstance } from "fastify";
import { getSettings } from "../modules/settings/index.js";
import {
  assembleCheckContext,
  buildLaunchPlan,
  getGameProfile,
} from "../modules/games/index.js";
import { LaunchReadinessResolver } from "../modules/readiness/index.js";
import { launcherDir } from "../modules/paths/index.js";
import { getServices } from "../services.js";
import { findGameEntry } from "./games.js";
import { broadcast } from "./ws.js";

export async function registerReadinessRoutes(app: FastifyInstance) {
  // GET /api/games/:id/readiness — what the game needs before it can start
  app.get<{ Params: { id: string } }>("/api/games/:id/readiness", async (request, reply) => {
    const entry = await findGameEntry(request.params.id);
    if (!entry) return reply.status(404).send({ error: "Game not found" });

    const profile = getGameProfile(entry.profileId);
    if (!profile) {
      return reply
        .status(501)
        .send({ error: `No game profile registered for "${entry.profileId}"` });
    }

    const settings = getSettings();
    const { registry, environment } = getServices();

    const context = await assembleCheckContext(
      entry,
      { registry, environment, settings },
      (update) => broadcast({ type: "readiness_status", gameId: entry.id, ...update, timestamp: Date.now() })
    );

    const resolver = new LaunchReadinessResolver(profile, {
      telemetryTimeoutMs: settings.telemetryTimeoutMs,
      patchSyncTimeoutMs: settings.patchSyncTimeoutMs,
    });

    return resolver.resolveWithDiagnostics(context);
  });

  // GET /api/games/:id/launch-plan — resolved runner features, command and env
  app.get<{ Params: { id: string } }>("/api/games/:id/launch-plan", async (request, reply) => {
    const entry = await findGameEntry(request.params.id);
    if (!entry) return reply.status(404).send({ error: "Game not found" });

    const settings = getSettings();
    const { registry, environment } = getServices();

    return buildLaunchPlan(entry, {
      registry,
      environment,
      settings,
      tempPath: settings.tempPath,
      launcherPath: launcherDir(),
    });
  });
}
