import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { getSettings, type Settings } from "../modules/settings/index.js";
import type { ComponentKind } from "../modules/components/index.js";
import { getServices } from "../services.js";
import { logger } from "../logger.js";

const log = logger.child({ module: "components" });

const KindParams = z.object({
  kind: z.enum(["wine", "dxvk"]),
});

/** Local folder holding the unpacked builds of one component kind. */
export function buildsFolder(settings: Settings, kind: ComponentKind): string {
  return kind === "wine" ? settings.runnerBuildsPath : settings.dxvkBuildsPath;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------
export async function registerComponentsRoutes(app: FastifyInstance) {
  // GET /api/components/:kind — catalog groups (wine follows Steam mode)
  app.get("/api/components/:kind", async (request, reply) => {
    const params = KindParams.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: params.error.flatten() });
    }

    const { registry } = getServices();
    const { componentsPath } = getSettings();
    return params.data.kind === "wine"
      ? registry.wineGroups(componentsPath)
      : registry.loadGroups(componentsPath, "dxvk");
  });

  // GET /api/components/:kind/downloaded — groups narrowed to unpacked builds
  app.get("/api/components/:kind/downloaded", async (request, reply) => {
    const params = KindParams.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: params.error.flatten() });
    }

    const { registry } = getServices();
    const settings = getSettings();
    const { kind } = params.data;
    return registry.listDownloaded(settings.componentsPath, buildsFolder(settings, kind), kind);
  });

  // GET /api/components/:kind/latest — recommended build
  app.get("/api/components/:kind/latest", async (request, reply) => {
    const params = KindParams.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({ error: params.error.flatten() });
    }

    const { registry } = getServices();
    return registry.latestVersion(getSettings().componentsPath, params.data.kind);
  });

  // GET /api/components/wine/find/:name — group by its name or a member's name
  app.get<{ Params: { name: string } }>(
    "/api/components/wine/find/:name",
    async (request, reply) => {
      const { registry } = getServices();
      const group = await registry.findGroupByNameOrMember(
        getSettings().componentsPath,
        request.params.name
      );

      if (!group) return reply.status(404).send({ error: "Runner group not found" });
      return group;
    }
  );

  // POST /api/components/reload — drop every cached catalog
  app.post("/api/components/reload", async () => {
    getServices().registry.reload();
    log.info("Components catalog cache cleared");
    return { status: "ok" };
  });
}
