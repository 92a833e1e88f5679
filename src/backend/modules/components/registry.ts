/**
 * ============================================================
 *  Component Registry — Wine / DXVK catalog
 * ============================================================
 *
 * Loads the two-level components catalog:
 *
 *   <catalog>/
 *   ├── components.json        { "wine": [group…], "dxvk": [group…] }
 *   ├── wine/<group>.json      [version…]
 *   └── dxvk/<group>.json      [version…]
 *
 * Required keys are validated strictly (the catalog ships separately from
 * the launcher); `features` objects are parsed leniently.
 *
 * Results are cached per (catalog path, kind) until invalidate() or
 * reload() is called. A catalog edited on disk after its first load is NOT
 * observed before that: callers that sync the catalog must invalidate it.
 *
 * When the runtime environment says the launcher was started by Steam,
 * wine lookups are served from Steam's own Proton installs instead.
 * ============================================================
 */
import { readFile } from "fs/promises";
import { statSync } from "fs";
import { join, resolve } from "path";
import { z } from "zod";
import { logger } from "../../logger.js";
import { NotFoundError, StructuralConfigError } from "../../errors.js";
import { parseFeatures, resolveFeatures } from "./features.js";
import type {
  ComponentGroup,
  ComponentKind,
  ComponentVersion,
  Features,
  WineFiles,
} from "./types.js";

const log = logger.child({ module: "components" });

export const INDEX_FILE = "components.json";

// ---------------------------------------------------------------------------
// Catalog document schemas
// ---------------------------------------------------------------------------

/** Group names become file names under `<catalog>/<kind>/`. */
const GroupName = z
  .string()
  .min(1)
  .refine((name) => !/[/\\]/.test(name) && !name.includes(".."), {
    message: "group name must not contain path separators or '..'",
  });

const GroupEntry = z.object({
  name: GroupName,
  title: z.string(),
  features: z.unknown().optional(),
});

const WineFilesJson = z.object({
  wine: z.string(),
  wine64: z.string().nullish(),
  wineserver: z.string().nullish(),
  wineboot: z.string().nullish(),
  winecfg: z.string().nullish(),
});

const WineVersionEntry = z.object({
  name: z.string(),
  title: z.string(),
  uri: z.string(),
  files: WineFilesJson,
  features: z.unknown().optional(),
});

const DxvkVersionEntry = z.object({
  name: z.string(),
  title: z.string(),
  uri: z.string(),
  files: z.record(z.string()).default({}),
  features: z.unknown().optional(),
});

// ---------------------------------------------------------------------------
// Pure helpers (exported for unit testing)
// ---------------------------------------------------------------------------

/**
 * Renders a zod issue path as a human-readable field path.
 *
 * @example
 *   formatFieldPath(["wine", 1, "versions", 0, "uri"]) → "wine[1].versions[0].uri"
 */
export function formatFieldPath(segments: ReadonlyArray<string | number>): string {
  let out = "";
  for (const segment of segments) {
    if (typeof segment === "number") out += `[${segment}]`;
    else out += out === "" ? segment : `.${segment}`;
  }
  return out;
}

function parseStrict<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  basePath: ReadonlyArray<string | number>
): z.output<T> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const path = [...basePath, ...(issue?.path ?? [])];
  throw new StructuralConfigError(formatFieldPath(path), issue?.message ?? "invalid value");
}

async function readJson(file: string, fieldPath: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(file, "utf-8");
  } catch (err) {
    throw new StructuralConfigError(fieldPath, `cannot read ${file}`, { cause: err });
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StructuralConfigError(fieldPath, `${file} is not valid JSON`, { cause: err });
  }
}

function toWineFiles(files: z.output<typeof WineFilesJson>): WineFiles {
  return {
    wine: files.wine,
    wine64: files.wine64 ?? null,
    wineserver: files.wineserver ?? null,
    wineboot: files.wineboot ?? null,
    winecfg: files.winecfg ?? null,
  };
}

function optionalFeatures(raw: unknown): Features | null {
  return raw === undefined ? null : parseFeatures(raw);
}

/** True when `path` exists and is a directory. */
export function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Reads one kind of the catalog from disk. No caching; use ComponentRegistry.
 */
export async function readCatalog(
  catalogPath: string,
  kind: ComponentKind
): Promise<ComponentGroup[]> {
  const index = await readJson(join(catalogPath, INDEX_FILE), INDEX_FILE);
  const groups = parseStrict(
    z.object({ [kind]: z.array(GroupEntry) }),
    index,
    []
  )[kind];

  const result: ComponentGroup[] = [];

  for (const [groupIndex, group] of groups.entries()) {
    const groupPath: Array<string | number> = [kind, groupIndex];
    const doc = await readJson(
      join(catalogPath, kind, `${group.name}.json`),
      formatFieldPath(groupPath)
    );
    const versionsPath = [...groupPath, "versions"];

    const versions: ComponentVersion[] =
      kind === "wine"
        ? parseStrict(z.array(WineVersionEntry), doc, versionsPath).map((v) => ({
            name: v.name,
            title: v.title,
            uri: v.uri,
            files: toWineFiles(v.files),
            features: optionalFeatures(v.features),
            managed: false,
          }))
        : parseStrict(z.array(DxvkVersionEntry), doc, versionsPath).map((v) => ({
            name: v.name,
            title: v.title,
            uri: v.uri,
            files: v.files,
            features: optionalFeatures(v.features),
            managed: false,
          }));

    result.push({
      name: group.name,
      title: group.title,
      features: optionalFeatures(group.features),
      versions,
      managed: false,
    });
  }

  return result;
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

/** Source of externally managed runner groups (Steam's Proton installs). */
export interface ManagedRunnerSource {
  discoverProtonInstalls(): Promise<ComponentGroup[]>;
}

export interface ComponentRegistryOptions {
  /** Serve wine lookups from `managedSource` instead of the catalog */
  preferManaged?: boolean;
  managedSource?: ManagedRunnerSource | null;
}

export interface VersionMatch {
  group: ComponentGroup;
  version: ComponentVersion;
}

export class ComponentRegistry {
  private readonly cache = new Map<string, Promise<ComponentGroup[]>>();
  private readonly preferManaged: boolean;
  private readonly managedSource: ManagedRunnerSource | null;

  constructor(options: ComponentRegistryOptions = {}) {
    this.preferManaged = options.preferManaged ?? false;
    this.managedSource = options.managedSource ?? null;
  }

  private static key(catalogPath: string, kind: ComponentKind): string {
    return `${resolve(catalogPath)}\u0000${kind}`;
  }

  /**
   * Loads the catalog groups of one kind. Concurrent callers share the same
   * in-flight load; a failed load is not cached. The returned array is shared
   * between callers and must not be mutated.
   */
  loadGroups(catalogPath: string, kind: ComponentKind): Promise<ComponentGroup[]> {
    const key = ComponentRegistry.key(catalogPath, kind);
    const cached = this.cache.get(key);
    if (cached) return cached;

    log.debug({ catalogPath, kind }, "Loading components catalog");

    const pending = readCatalog(catalogPath, kind).then(
      (groups) => {
        log.debug(
          { catalogPath, kind, groups: groups.length },
          "Components catalog loaded"
        );
        return groups;
      },
      (err: unknown) => {
        this.cache.delete(key);
        throw err;
      }
    );

    this.cache.set(key, pending);
    return pending;
  }

  /** Drops the cached results for one catalog path (both kinds). */
  invalidate(catalogPath: string): void {
    for (const kind of ["wine", "dxvk"] as const) {
      this.cache.delete(ComponentRegistry.key(catalogPath, kind));
    }
  }

  /** Drops every cached catalog. */
  reload(): void {
    this.cache.clear();
  }

  /**
   * Wine groups as seen by the launcher: Steam's Proton installs when running
   * under Steam, the catalog otherwise (or when discovery fails).
   */
  async wineGroups(catalogPath: string): Promise<ComponentGroup[]> {
    if (this.preferManaged && this.managedSource) {
      try {
        return await this.managedSource.discoverProtonInstalls();
      } catch (err) {
        log.warn({ err }, "Steam Proton discovery failed, using the components catalog");
      }
    }
    return this.loadGroups(catalogPath, "wine");
  }

  private groupsOf(catalogPath: string, kind: ComponentKind): Promise<ComponentGroup[]> {
    return kind === "wine" ? this.wineGroups(catalogPath) : this.loadGroups(catalogPath, kind);
  }

  /**
   * Finds a wine group by its own name or by the name of any of its versions,
   * so both "wine-ge-proton" and "lutris-GE-Proton7-37-x86_64" address the
   * same group.
   */
  async findGroupByNameOrMember(
    catalogPath: string,
    name: string
  ): Promise<ComponentGroup | null> {
    for (const group of await this.wineGroups(catalogPath)) {
      if (group.name === name || group.versions.some((v) => v.name === name)) {
        return group;
      }
    }
    return null;
  }

  /** Finds a version by name together with the group it belongs to. */
  async findVersion(
    catalogPath: string,
    name: string,
    kind: ComponentKind = "wine"
  ): Promise<VersionMatch | null> {
    for (const group of await this.groupsOf(catalogPath, kind)) {
      const version = group.versions.find((v) => v.name === name);
      if (version) return { group, version };
    }
    return null;
  }

  /** Like findVersion(), but throws NotFoundError when nothing matches. */
  async requireVersion(
    catalogPath: string,
    name: string,
    kind: ComponentKind = "wine"
  ): Promise<VersionMatch> {
    const match = await this.findVersion(catalogPath, name, kind);
    if (!match) throw new NotFoundError(name, `No ${kind} version named "${name}"`);
    return match;
  }

  /** The recommended build: first version of the first group. */
  async latestVersion(catalogPath: string, kind: ComponentKind): Promise<VersionMatch> {
    const groups = await this.groupsOf(catalogPath, kind);
    const group = groups.find((g) => g.versions.length > 0);
    if (!group) throw new NotFoundError(kind, `The ${kind} catalog lists no versions`);
    return { group, version: group.versions[0] };
  }

  /**
   * Groups filtered to the versions present as sub-folders of `localFolder`.
   * Managed groups are returned unfiltered; groups left empty are dropped.
   */
  async listDownloaded(
    catalogPath: string,
    localFolder: string,
    kind: ComponentKind = "wine"
  ): Promise<ComponentGroup[]> {
    const downloaded: ComponentGroup[] = [];

    for (const group of await this.groupsOf(catalogPath, kind)) {
      if (group.managed) {
        downloaded.push(group);
        continue;
      }

      const versions = group.versions.filter((v) => isDownloaded(v, localFolder));
      if (versions.length > 0) downloaded.push({ ...group, versions });
    }

    return downloaded;
  }
}

// ---------------------------------------------------------------------------
// Version helpers
// ---------------------------------------------------------------------------

/** Whether an unmanaged build is unpacked under `folder`. */
export function isDownloaded(version: ComponentVersion, folder: string): boolean {
  return isDirectory(join(folder, version.name));
}

/** Folder holding the build: its live path when managed, else `<builds>/<name>`. */
export function runnerDir(version: ComponentVersion, buildsFolder: string): string {
  return version.managed ? version.uri : join(buildsFolder, version.name);
}

/** Effective features of a version within its group. */
export function featuresFor(version: ComponentVersion, group: ComponentGroup): Features {
  return resolveFeatures(version.features, group.features);
}
