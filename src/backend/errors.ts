/**
 * Error taxonomy shared by the components, steam and readiness modules.
 *
 * Provider errors (version diffs, patch mirrors, telemetry) are never wrapped:
 * they reach the caller exactly as the external collaborator threw them.
 */

export type LauncherErrorCode = "STRUCTURAL_CONFIG" | "DISCOVERY" | "NOT_FOUND";

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;

  constructor(code: LauncherErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * The components catalog does not have the expected shape.
 * `fieldPath` points at the offending value, e.g. `wine[1].versions[0].uri`.
 */
export class StructuralConfigError extends LauncherError {
  readonly fieldPath: string;

  constructor(fieldPath: string, message: string, options?: { cause?: unknown }) {
    super("STRUCTURAL_CONFIG", `Wrong components index structure at ${fieldPath}: ${message}`, options);
    this.fieldPath = fieldPath;
  }
}

/** Steam mode is asserted by the environment but no Steam install can be found. */
export class DiscoveryError extends LauncherError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("DISCOVERY", message, options);
  }
}

/** No runner or version matches the requested name. */
export class NotFoundError extends LauncherError {
  readonly lookup: string;

  constructor(lookup: string, message?: string) {
    super("NOT_FOUND", message ?? `No component matches "${lookup}"`);
    this.lookup = lookup;
  }
}
