import type { GameProfile } from "../readiness/types.js";

// ---------------------------------------------------------------------------
// Profile registry
// Game profiles bundle the external providers (version diffs, patch mirrors,
// telemetry) for one game. The host registers them at startup.
// ---------------------------------------------------------------------------

const profiles = new Map<string, GameProfile>();

export function registerGameProfile(profile: GameProfile): void {
  profiles.set(profile.id, profile);
}

export function getGameProfile(id: string): GameProfile | null {
  return profiles.get(id) ?? null;
}

export function listGameProfiles(): GameProfile[] {
  return [...profiles.values()];
}

export function clearGameProfiles(): void {
  profiles.clear();
}
