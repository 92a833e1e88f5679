import type { FastifyInstance } from "fastify";
import { eq } from "drizzle-orm";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { join } from "path";
import { getDb } from "../db/migrate.js";
import { games, type GameRow } from "../db/schema.js";
import { getSettings } from "../modules/settings/index.js";
import { getGameProfile, type GameEntry } from "../modules/games/index.js";
import { baseInstallDir, launcherDir } from "../modules/paths/index.js";
import { getServices } from "../services.js";

export function toGameEntry(row: GameRow): GameEntry {
  return {
    id: row.id,
    name: row.name,
    profileId: row.profileId,
    edition: row.edition,
    gamePath: row.gamePath,
    winePrefix: row.winePrefix,
    runner: row.runner,
    voices: row.voices,
    toggles: row.toggles,
    telemetryIgnored: row.telemetryIgnored,
  };
}

export async function findGameEntry(id: string): Promise<GameEntry | null> {
  const db = getDb();
  const [row] = await db.select().from(games).where(eq(games.id, id));
  return row ? toGameEntry(row) : null;
}

// ---------------------------------------------------------------------------
// Route registration
// ---------------------------------------------------------------------------
export async function registerGamesRoutes(app: FastifyInstance) {
  // GET /api/games
  app.get("/api/games", async () => {
    const db = getDb();
    const rows = await db.select().from(games);
    return rows.map(toGameEntry);
  });

  // GET /api/games/:id
  app.get<{ Params: { id: string } }>("/api/games/:id", async (request, reply) => {
    const entry = await findGameEntry(request.params.id);
    if (!entry) return reply.status(404).send({ error: "Game not found" });
    return entry;
  });

  // POST /api/games — add a game for a registered profile
  const AddGameBody = z.object({
    name: z.string().min(1),
    profileId: z.string().min(1),
    edition: z.string().min(1),
    gamePath: z.string().min(1).optional(),
    winePrefix: z.string().min(1).optional(),
    runner: z.string().min(1).nullable().optional(),
    voices: z.array(z.string().min(1)).optional(),
    toggles: z.record(z.boolean()).optional(),
    telemetryIgnored: z.boolean().optional(),
  });

  app.post("/api/games", async (request, reply) => {
    const body = AddGameBody.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: body.error.flatten() });
    }

    const profile = getGameProfile(body.data.profileId);
    if (!profile) {
      return reply.status(400).send({ error: `Unknown game profile "${body.data.profileId}"` });
    }
    if (!profile.editions.includes(body.data.edition)) {
      return reply
        .status(400)
        .send({ error: `Profile "${profile.id}" has no edition "${body.data.edition}"` });
    }

    const settings = getSettings();
    const { environment } = getServices();
    const id = uuidv4();

    const gamePath =
      body.data.gamePath ??
      profile.pathLayout.defaultGamePath(
        body.data.edition,
        environment,
        baseInstallDir(environment, launcherDir())
      );

    const db = getDb();
    await db.insert(games).values({
      id,
      name: body.data.name,
      profileId: profile.id,
      edition: body.data.edition,
      gamePath,
      winePrefix: body.data.winePrefix ?? join(settings.prefixesPath, id),
      runner: body.data.runner ?? null,
      voices: body.data.voices ?? [...settings.defaultVoices],
      toggles: body.data.toggles ?? {},
      telemetryIgnored: body.data.telemetryIgnored ?? false,
    });

    return reply.status(201).send(await findGameEntry(id));
  });

  // PUT /api/games/:id — update the launch configuration
  const UpdateGameBody = z.object({
    name: z.string().min(1).optional(),
    edition: z.string().min(1).optional(),
    gamePath: z.string().min(1).optional(),
    winePrefix: z.string().min(1).optional(),
    runner: z.string().min(1).nullable().optional(),
    voices: z.array(z.string().min(1)).optional(),
    toggles: z.record(z.boolean()).optional(),
    telemetryIgnored: z.boolean().optional(),
  });

  app.put<{ Params: { id: string } }>("/api/games/:id", async (request, reply) => {
    const body = UpdateGameBody.safeParse(request.body);
    if (!body.success) {
      return reply.status(400).send({ error: body.error.flatten() });
    }

    const existing = await findGameEntry(request.params.id);
    if (!existing) return reply.status(404).send({ error: "Game not found" });

    const edition = body.data.edition;
    const profile = getGameProfile(existing.profileId);
    if (edition !== undefined && profile && !profile.editions.includes(edition)) {
      return reply.status(400).send({ error: `Profile "${profile.id}" has no edition "${edition}"` });
    }

    if (Object.keys(body.data).length === 0) return existing;

    const db = getDb();
    await db.update(games).set(body.data).where(eq(games.id, existing.id));

    return findGameEntry(existing.id);
  });

  // DELETE /api/games/:id
  app.delete<{ Params: { id: string } }>("/api/games/:id", async (request, reply) => {
    const existing = await findGameEntry(request.params.id);
    if (!existing) return reply.status(404).send({ error: "Game not found" });

    const db = getDb();
    await db.delete(games).where(eq(games.id, existing.id));
    return reply.status(204).send();
  });
}
