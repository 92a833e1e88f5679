/**
 * A stored game entry: everything needed to assemble a CheckContext for it.
 * Mirrors one row of the `games` table.
 */
export interface GameEntry {
  id: string;
  name: string;
  /** Registered GameProfile id, e.g. "sample-rpg" */
  profileId: string;
  edition: string;
  gamePath: string;
  /** Configured prefix folder, before any runner prefix sub-folder */
  winePrefix: string;
  /** Selected runner version name; null = none selected */
  runner: string | null;
  voices: string[];
  toggles: Record<string, boolean>;
  telemetryIgnored: boolean;
}
