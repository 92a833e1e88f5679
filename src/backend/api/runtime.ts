import type { FastifyInstance } from "fastify";
import { defaultWindowSize } from "../modules/steam/index.js";
import { cacheDir, launcherDir } from "../modules/paths/index.js";
import { listGameProfiles } from "../modules/games/index.js";
import { getServices } from "../services.js";

export async function registerRuntimeRoutes(app: FastifyInstance) {
  // GET /api/runtime — how the launcher was started
  app.get("/api/runtime", async () => {
    const { environment } = getServices();
    return {
      environment,
      windowSize: defaultWindowSize(environment),
      paths: {
        launcher: launcherDir(),
        cache: cacheDir(),
      },
      profiles: listGameProfiles().map(({ id, title, editions }) => ({ id, title, editions })),
    };
  });

  // GET /api/steam/proton — Proton builds Steam knows about
  app.get("/api/steam/proton", async () => {
    const { discovery } = getServices();
    return {
      steamRoot: discovery.locateSteamRoot(),
      installed: discovery.installedProtonPaths(),
      groups: await discovery.discoverProtonInstalls(),
    };
  });
}
