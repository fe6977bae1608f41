import assert from 'node:assert/strict';
import test from 'node:test';

import { ExampleResources, readmeText } from '../src/capabilities/example-resources.js';
import { ExampleTools } from '../src/capabilities/example-tools.js';
import { NotFoundError } from '../src/lib/errors.js';
import { EntityAnalyzer } from '../src/services/entity-analyzer.js';
import { EntityCatalog } from '../src/services/entity-catalog.js';
import type { ExtensionSettings } from '../src/settings.js';

const settings: ExtensionSettings = {
  name: 'test-extension',
  version: '0.0.1',
  scheme: 'example',
  framework: 'example',
  manifestPath: 'mcp-extension.json5',
};

const ENTITIES = [
  { id: 'alpha', name: 'Alpha', kind: 'service', tags: ['core', 'http'] },
  { id: 'beta', name: 'Beta', kind: 'library', tags: ['core'] },
  { id: 'gamma', name: 'Gamma', kind: 'service', tags: ['queue'] },
  { id: 'delta', name: 'Delta', kind: 'dataset', tags: ['analytics', 'core'] },
];

const createTools = () => new ExampleTools(new EntityCatalog(), new EntityAnalyzer(), 'example');

test('example-list-entities returns the catalog under "entities"', () => {
  const text = createTools().listEntities();
  assert.equal(text, JSON.stringify({ entities: ENTITIES }, null, 2));
});

test('example tools return identical output for identical input', () => {
  const tools = createTools();
  assert.equal(tools.listEntities(), tools.listEntities());
  assert.equal(tools.summarizeEntities('service'), tools.summarizeEntities('service'));
});

test('example-get-entity returns one entity or raises not found', () => {
  const tools = createTools();
  assert.deepEqual(JSON.parse(tools.getEntity('beta')), { entity: ENTITIES[1] });
  assert.throws(() => tools.getEntity('omega'), (error: unknown) => {
    assert.ok(error instanceof NotFoundError);
    assert.equal(error.message, 'Entity omega not found.');
    return true;
  });
});

test('example-summarize-entities counts kinds and collects tags', () => {
  const tools = createTools();
  assert.deepEqual(JSON.parse(tools.summarizeEntities()), {
    kind: null,
    total: 4,
    byKind: { service: 2, library: 1, dataset: 1 },
    tags: ['analytics', 'core', 'http', 'queue'],
  });
  assert.deepEqual(JSON.parse(tools.summarizeEntities('service')), {
    kind: 'service',
    total: 2,
    byKind: { service: 2 },
    tags: ['core', 'http', 'queue'],
  });
});

test('example tools declare their names and argument shapes', async () => {
  const definitions = createTools().tools();
  assert.deepEqual(
    definitions.map(tool => tool.name),
    ['example-list-entities', 'example-get-entity', 'example-summarize-entities']
  );
  assert.deepEqual(Object.keys(definitions[1]?.inputSchema.shape ?? {}), ['id']);

  const getEntity = definitions[1];
  assert.ok(getEntity);
  assert.deepEqual(JSON.parse(await getEntity.invoke({ id: 'gamma' })), { entity: ENTITIES[2] });
  await assert.rejects(getEntity.invoke({ id: '' }), { name: 'ValidationError' });
});

test('catalog reads hand out copies', () => {
  const catalog = new EntityCatalog();
  const [first] = catalog.list();
  assert.ok(first);
  first.tags.push('mutated');
  assert.deepEqual(catalog.get('alpha').tags, ['core', 'http']);
});

test('example://config resource returns the settings document', async () => {
  const resources = new ExampleResources(settings).resources();
  const config = resources.find(resource => resource.uri === 'example://config');
  assert.ok(config);

  const record = await config.read();
  assert.deepEqual(Object.keys(record).sort(), ['mimeType', 'text', 'uri']);
  assert.equal(record.uri, 'example://config');
  assert.equal(record.mimeType, 'application/json');
  assert.deepEqual(JSON.parse(record.text), {
    name: 'test-extension',
    version: '0.0.1',
    scheme: 'example',
    framework: 'example',
  });
});

test('example://readme resource returns its text unmodified', async () => {
  const readme = new ExampleResources(settings).resources().find(resource => resource.name === 'readme');
  assert.ok(readme);
  assert.deepEqual(await readme.read(), {
    uri: 'example://readme',
    mimeType: 'text/plain',
    text: readmeText(settings),
  });
});

test('tool names follow the configured framework', () => {
  const tools = new ExampleTools(new EntityCatalog(), new EntityAnalyzer(), 'demo').tools();
  assert.deepEqual(
    tools.map(tool => tool.name),
    ['demo-list-entities', 'demo-get-entity', 'demo-summarize-entities']
  );
});

test('readme text names the configured tools and resources', () => {
  assert.equal(
    readmeText({ name: 'demo-extension', framework: 'demo', scheme: 'demo' }),
    [
      'demo-extension MCP extension',
      '',
      'Tools:',
      '- demo-list-entities: list the entity catalog',
      '- demo-get-entity: read one entity by id',
      '- demo-summarize-entities: count entities per kind',
      '',
      'Resources:',
      '- demo://config: extension settings (application/json)',
      '- demo://readme: this text (text/plain)',
      '',
    ].join('\n')
  );
});

test('resource URIs follow the configured scheme', () => {
  const resources = new ExampleResources({ ...settings, scheme: 'demo' }).resources();
  assert.deepEqual(
    resources.map(resource => resource.uri),
    ['demo://config', 'demo://readme']
  );
});
