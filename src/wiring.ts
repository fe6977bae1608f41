import { ExampleResources } from './capabilities/example-resources.js';
import { ExampleTools } from './capabilities/example-tools.js';
import { ServiceContainer } from './container.js';
import { EntityAnalyzer } from './services/entity-analyzer.js';
import { EntityCatalog } from './services/entity-catalog.js';
import type { ExtensionSettings } from './settings.js';

export type ExtensionServices = {
  settings: ExtensionSettings;
  entityCatalog: EntityCatalog;
  entityAnalyzer: EntityAnalyzer;
  exampleTools: ExampleTools;
  exampleResources: ExampleResources;
};

/**
 * Service list for this extension. Add a capability by registering it with
 * `registerCapability` and naming what its constructor needs.
 */
export const createServiceContainer = (settings: ExtensionSettings) =>
  new ServiceContainer<ExtensionServices>()
    .registerInstance('settings', settings)
    .register('entityCatalog', { factory: () => new EntityCatalog() })
    .register('entityAnalyzer', { factory: () => new EntityAnalyzer() })
    .registerCapability('exampleTools', {
      dependencies: ['entityCatalog', 'entityAnalyzer', 'settings'],
      factory: services =>
        new ExampleTools(
          services.resolve('entityCatalog'),
          services.resolve('entityAnalyzer'),
          services.resolve('settings').framework
        ),
    })
    .registerCapability('exampleResources', {
      dependencies: ['settings'],
      factory: services => new ExampleResources(services.resolve('settings')),
    });
