import type { FastifyInstance } from "fastify";
import { getSettings, updateSettings, SettingsSchema } from "../modules/settings/index.js";
import { getServices } from "../services.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "settings" });

export async function registerSettingsRoutes(app: FastifyInstance) {
  // GET /api/settings
  app.get("/api/settings", async () => {
    return getSettings();
  });

  // PUT /api/settings
  app.put("/api/settings", async (request, reply) => {
    const partial = SettingsSchema.partial().safeParse(request.body);
    if (!partial.success) {
      return reply.status(400).send({ error: partial.error.flatten() });
    }

    const previous = getSettings();
    const updated = updateSettings(partial.data);

    // The registry caches per catalog path; a moved catalog is read afresh
    // but the old entry would linger.
    if (updated.componentsPath !== previous.componentsPath) {
      getServices().registry.invalidate(previous.componentsPath);
      log.info(
        { from: previous.componentsPath, to: updated.componentsPath },
        "Components catalog folder changed"
      );
    }

    return updated;
  });
}
