import { join } from "path";
import { z } from "zod";
import type { Features, TemplateVars } from "./types.js";

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Features used when neither the version nor its group defines any. */
export function defaultFeatures(): Features {
  return {
    bundle: null,
    needDxvk: true,
    compactLaunch: false,
    prefixSubdir: null,
    command: null,
    env: {},
  };
}

// ---------------------------------------------------------------------------
// Catalog JSON → Features
// ---------------------------------------------------------------------------

/**
 * Every field falls back to its default on its own, so one mistyped value
 * never invalidates the rest of the features object.
 */
const FeaturesJson = z.object({
  bundle: z.literal("Proton").nullable().catch(null),
  need_dxvk: z.boolean().catch(true),
  compact_launch: z.boolean().catch(false),
  prefix_subdir: z.string().nullable().catch(null),
  command: z.string().nullable().catch(null),
  env: z.record(z.unknown()).catch({}),
});

/**
 * Parses a catalog `features` value. Never throws: a non-object value yields
 * the defaults, and non-string env values are kept as their JSON text.
 */
export function parseFeatures(raw: unknown): Features {
  const input = typeof raw === "object" && raw !== null && !Array.isArray(raw) ? raw : {};
  const parsed = FeaturesJson.parse(input);

  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(parsed.env)) {
    env[key] = typeof value === "string" ? value : JSON.stringify(value);
  }

  return {
    bundle: parsed.bundle,
    needDxvk: parsed.need_dxvk,
    compactLaunch: parsed.compact_launch,
    prefixSubdir: parsed.prefix_subdir,
    command: parsed.command,
    env,
  };
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Returns the effective features of a version.
 *
 * Whole-object fallback: version features replace the group's entirely when
 * present, then the group's, then the defaults. Fields are never merged
 * across levels, so a version that overrides only `env` must restate every
 * other field it relies on.
 */
export function resolveFeatures(
  versionFeatures: Features | null | undefined,
  groupFeatures: Features | null | undefined
): Features {
  return versionFeatures ?? groupFeatures ?? defaultFeatures();
}

// ---------------------------------------------------------------------------
// Templates
// ---------------------------------------------------------------------------

const PLACEHOLDER = /%(build|prefix|temp|launcher|game)%/g;

/**
 * Substitutes %build%, %prefix%, %temp%, %launcher% and %game%.
 * Any other %word% is left untouched.
 *
 * @example
 *   expandTemplate("python3 '%build%/proton' run", { build: "/opt/p", ... })
 *   // → "python3 '/opt/p/proton' run"
 */
export function expandTemplate(template: string, vars: TemplateVars): string {
  return template.replace(PLACEHOLDER, (_match, key: keyof TemplateVars) => vars[key]);
}

/** Expanded launch command, or null when the features define none. */
export function renderLaunchCommand(features: Features, vars: TemplateVars): string | null {
  return features.command === null ? null : expandTemplate(features.command, vars);
}

/**
 * Path of the Wine prefix actually used by the runner.
 * Proton keeps its prefix in a `pfx/` sub-folder of the compat data path.
 */
export function effectivePrefix(prefix: string, features: Features): string {
  return features.prefixSubdir ? join(prefix, features.prefixSubdir) : prefix;
}

/**
 * Builds the environment a runner is launched with.
 *
 * Variable precedence (highest wins):
 *   overrides  >  expanded feature env  >  inherited environment
 */
export function buildLaunchEnv(
  features: Features,
  vars: TemplateVars,
  options: {
    inherited?: NodeJS.ProcessEnv;
    overrides?: Record<string, string>;
  } = {}
): Record<string, string> {
  const inherited: Record<string, string> = {};
  for (const [key, value] of Object.entries(options.inherited ?? {})) {
    if (value !== undefined) inherited[key] = value;
  }

  const featureVars: Record<string, string> = {};
  for (const [key, value] of Object.entries(features.env)) {
    featureVars[key] = expandTemplate(value, vars);
  }

  return {
    ...inherited,
    ...featureVars,
    ...(options.overrides ?? {}),
  };
}
