import assert from 'node:assert/strict';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import test from 'node:test';

import { loadManifest, parseManifest, verifyManifest } from '../src/manifest.js';

test('parseManifest reads scan-dirs and includes from JSON5', () => {
  const manifest = parseManifest(`{
    // comment
    'scan-dirs': ['src/tools', 'src/resources'],
    includes: ['config/services.json',],
  }`);
  assert.deepEqual(manifest, {
    name: undefined,
    scanDirs: ['src/tools', 'src/resources'],
    includes: ['config/services.json'],
  });
});

test('parseManifest defaults includes to an empty list', () => {
  assert.deepEqual(parseManifest('{ "scan-dirs": ["src"] }').includes, []);
});

test('parseManifest rejects manifests without scan dirs', () => {
  assert.throws(() => parseManifest('{ "scan-dirs": [] }'), {
    name: 'ConfigurationError',
    message: 'Invalid manifest.',
  });
  assert.throws(() => parseManifest('{ includes: [] }'), { name: 'ConfigurationError' });
});

test('parseManifest rejects unknown keys and paths outside the root', () => {
  assert.throws(() => parseManifest('{ "scan-dirs": ["src"], extra: true }'), {
    name: 'ConfigurationError',
  });
  assert.throws(() => parseManifest('{ "scan-dirs": ["/etc"] }'), { name: 'ConfigurationError' });
  assert.throws(() => parseManifest('{ "scan-dirs": ["../elsewhere"] }'), {
    name: 'ConfigurationError',
  });
});

test('parseManifest reports syntax errors as configuration errors', () => {
  assert.throws(() => parseManifest('{ scan-dirs: ', 'broken.json5'), (error: unknown) => {
    assert.ok(error instanceof Error);
    assert.equal(error.name, 'ConfigurationError');
    assert.ok(error.message.startsWith('Could not parse broken.json5:'));
    return true;
  });
});

test('loadManifest reads the repository manifest', () => {
  const manifest = loadManifest(path.resolve('mcp-extension.json5'));
  assert.deepEqual(manifest, {
    name: 'example-extension',
    scanDirs: ['src/capabilities'],
    includes: ['config/default.json'],
  });
  verifyManifest(manifest, process.cwd());
});

test('loadManifest fails for a missing file', () => {
  const missing = path.join(os.tmpdir(), 'no-such-manifest.json5');
  assert.throws(() => loadManifest(missing), {
    name: 'ConfigurationError',
    message: `Discovery manifest not found at ${missing}.`,
  });
});

test('verifyManifest lists every missing path', () => {
  const root = mkdtempSync(path.join(os.tmpdir(), 'mcp-extension-'));
  try {
    mkdirSync(path.join(root, 'src'));
    writeFileSync(path.join(root, 'services.json'), '{}');
    writeFileSync(path.join(root, 'not-a-dir'), '');

    verifyManifest({ scanDirs: ['src'], includes: ['services.json'] }, root);

    assert.throws(
      () =>
        verifyManifest(
          { scanDirs: ['src', 'lib', 'not-a-dir'], includes: ['services.json', 'extra.json'] },
          root
        ),
      {
        name: 'ConfigurationError',
        message: 'Discovery manifest names missing paths: lib, not-a-dir, extra.json.',
      }
    );
  } finally {
    rmSync(root, { recursive: true, force: true });
  }
});
