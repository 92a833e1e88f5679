import Fastify from "fastify";
import fastifyWebSocket from "@fastify/websocket";
import { fileURLToPath } from "url";
import { logger, logLevel, prettyLogs } from "./logger.js";
import { LauncherError, type LauncherErrorCode } from "./errors.js";
import { initDb } from "./db/migrate.js";
import { loadSettings } from "./modules/settings/index.js";
import { registerGameProfile } from "./modules/games/index.js";
import type { GameProfile } from "./modules/readiness/index.js";
import { initServices, type ServicesOptions } from "./services.js";
import { registerComponentsRoutes } from "./api/components.js";
import { registerRuntimeRoutes } from "./api/runtime.js";
import { registerGamesRoutes } from "./api/games.js";
import { registerReadinessRoutes } from "./api/readiness.js";
import { registerSettingsRoutes } from "./api/settings.js";
import { registerWsRoutes } from "./api/ws.js";

const ERROR_STATUS: Record<LauncherErrorCode, number> = {
  STRUCTURAL_CONFIG: 422,
  NOT_FOUND: 404,
  DISCOVERY: 503,
};

export interface ServerOptions {
  /** Game profiles to register before routes are served */
  profiles?: ReadonlyArray<GameProfile>;
  services?: ServicesOptions;
}

export async function buildServer(options: ServerOptions = {}) {
  const settings = await loadSettings();
  const services = initServices(options.services);

  for (const profile of options.profiles ?? []) {
    registerGameProfile(profile);
  }

  const app = Fastify({
    logger: {
      level: logLevel,
      transport: prettyLogs
        ? { target: "pino-pretty", options: { colorize: true } }
        : undefined,
    },
  });

  // WebSocket support
  await app.register(fastifyWebSocket);

  // Launcher errors carry their own status; everything else is a 500
  app.setErrorHandler((err, request, reply) => {
    if (err instanceof LauncherError) {
      request.log.warn({ err }, "Request failed");
      return reply.status(ERROR_STATUS[err.code]).send({ error: err.message, code: err.code });
    }
    return reply.send(err);
  });

  // Health check
  app.get("/api/health", async () => ({
    status: "ok",
    version: "0.1.0",
    environment: services.environment.kind,
    componentsPath: settings.componentsPath,
    timestamp: Date.now(),
  }));

  // Register route modules
  await registerRuntimeRoutes(app);
  await registerComponentsRoutes(app);
  await registerGamesRoutes(app);
  await registerReadinessRoutes(app);
  await registerSettingsRoutes(app);
  await registerWsRoutes(app);

  return app;
}

async function main() {
  // Ensure DB and migrations are ready before accepting requests
  await initDb();

  const app = await buildServer();
  const port = Number(process.env.WCL_PORT ?? 9420);
  const host = process.env.WCL_HOST ?? "127.0.0.1";

  try {
    await app.listen({ port, host });
    logger.info({ url: `http://${host}:${port}` }, "Launcher ready");
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  const shutdown = () => {
    app.close()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// Allow importing buildServer() without starting the server
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  await main();
}
