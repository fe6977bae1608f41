import path from 'node:path';

import debug from '../util/debug.js';
import type { ServiceContainer } from './container.js';
import { type DiscoveryManifest, loadManifest, verifyManifest } from './manifest.js';
import { createMcpServer } from './mcp/core.js';
import { CapabilityRegistry } from './registry.js';
import { type ExtensionSettings, getExtensionSettings } from './settings.js';
import { createServiceContainer, type ExtensionServices } from './wiring.js';

export interface BootstrapOptions {
  settings?: ExtensionSettings;
  /** Directory the manifest and its paths are resolved against. */
  rootDir?: string;
  container?: ServiceContainer<ExtensionServices>;
}

export const buildCapabilityRegistry = (
  container: ServiceContainer<ExtensionServices>,
  settings: Pick<ExtensionSettings, 'framework' | 'scheme'>
): CapabilityRegistry => {
  container.validate();
  const registry = new CapabilityRegistry({
    framework: settings.framework,
    scheme: settings.scheme,
  });
  for (const capability of container.capabilities()) {
    registry.registerCapability(capability);
  }
  return registry;
};

export const bootstrapExtension = (options: BootstrapOptions = {}) => {
  const settings = options.settings ?? getExtensionSettings();
  const rootDir = options.rootDir ?? process.cwd();

  const manifest: DiscoveryManifest = loadManifest(path.resolve(rootDir, settings.manifestPath));
  verifyManifest(manifest, rootDir);

  const container = options.container ?? createServiceContainer(settings);
  const registry = buildCapabilityRegistry(container, settings);
  const { server } = createMcpServer({ registry, settings });

  debug.app(`Bootstrapped ${settings.name}@${settings.version}`);
  return { settings, manifest, container, registry, server };
};
