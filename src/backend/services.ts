import { logger } from "./logger.js";
import { ComponentRegistry } from "./modules/components/index.js";
import {
  SteamRuntimeDiscovery,
  detectEnvironment,
  type RuntimeEnvironment,
} from "./modules/steam/index.js";

// ---------------------------------------------------------------------------
// Process-wide services
// The runtime environment is read once at startup and handed to discovery
// and the registry; route modules reach them through getServices().
// ---------------------------------------------------------------------------

export interface Services {
  environment: RuntimeEnvironment;
  discovery: SteamRuntimeDiscovery;
  registry: ComponentRegistry;
}

let _services: Services | null = null;

export interface ServicesOptions {
  env?: NodeJS.ProcessEnv;
  steamRoots?: ReadonlyArray<string>;
}

export function initServices(options: ServicesOptions = {}): Services {
  const environment = detectEnvironment(options.env);
  const discovery = new SteamRuntimeDiscovery({ environment, steamRoots: options.steamRoots });
  const registry = new ComponentRegistry({
    preferManaged: environment.launchedFromSteam,
    managedSource: discovery,
  });

  logger.info({ environment: environment.kind }, "Runtime environment detected");

  _services = { environment, discovery, registry };
  return _services;
}

export function getServices(): Services {
  if (!_services) throw new Error("Services not initialized — call initServices() first");
  return _services;
}
