/**
 * Shared types for the components module.
 * Imported by features, registry, and the steam module — never from index.ts —
 * so there are no circular dependencies between the sub-modules.
 */

export type ComponentKind = "wine" | "dxvk";

export type BundleKind = "Proton";

export interface Features {
  /** Set when the build is a bundle that manages its own Wine (e.g. Proton) */
  bundle: BundleKind | null;
  /** Whether the runner needs DXVK installed into the prefix */
  needDxvk: boolean;
  /**
   * Launch through a temporary batch file instead of passing the launch
   * arguments directly. Needed when `command` cannot carry multi-line arguments.
   */
  compactLaunch: boolean;
  /** Sub-folder of the configured prefix that holds the actual Wine prefix, e.g. "pfx" */
  prefixSubdir: string | null;
  /**
   * Launch command template.
   * Placeholders: %build%, %prefix%, %temp%, %launcher%, %game%
   */
  command: string | null;
  /** Environment variables applied at launch; values accept the same placeholders */
  env: Record<string, string>;
}

/** Binary layout of a Wine build, relative to the build folder. */
export interface WineFiles {
  wine: string;
  wine64: string | null;
  wineserver: string | null;
  wineboot: string | null;
  winecfg: string | null;
}

export interface ComponentVersion {
  /** Unique within the group; also the on-disk folder name for unmanaged builds */
  name: string;
  title: string;
  /** Download artifact for catalog builds, absolute install path for managed ones */
  uri: string;
  /** Wine builds carry a WineFiles layout; DXVK builds carry whatever the catalog lists */
  files: WineFiles | Record<string, string>;
  features: Features | null;
  managed: boolean;
}

export interface ComponentGroup {
  /** Unique key within its kind */
  name: string;
  title: string;
  features: Features | null;
  versions: ComponentVersion[];
  /** Externally owned group (e.g. Steam Proton); never filtered by folder presence */
  managed: boolean;
}

/** Values substituted into command and env templates. */
export interface TemplateVars {
  build: string;
  prefix: string;
  temp: string;
  launcher: string;
  game: string;
}
