import { existsSync, readFileSync, statSync } from 'node:fs';
import path from 'node:path';
import JSON5 from 'json5';
import { z } from 'zod';

import debug from '../util/debug.js';
import { ConfigurationError } from './lib/errors.js';
import { toValidationErrorFromZod } from './mcp/errors.js';

const relativePathSchema = z
  .string()
  .min(1)
  .refine(value => !path.isAbsolute(value), { message: 'Must be a path relative to the extension root.' })
  .refine(value => !value.split(/[\\/]/).includes('..'), {
    message: 'Must not leave the extension root.',
  });

const manifestSchema = z
  .object({
    name: z.string().min(1).optional(),
    'scan-dirs': z.array(relativePathSchema).min(1),
    includes: z.array(relativePathSchema).default([]),
  })
  .strict();

export type DiscoveryManifest = {
  name?: string;
  scanDirs: string[];
  includes: string[];
};

export const parseManifest = (source: string, origin = 'manifest'): DiscoveryManifest => {
  let raw: unknown;
  try {
    raw = JSON5.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Could not parse ${origin}: ${message}`);
  }

  const result = manifestSchema.safeParse(raw);
  if (!result.success) {
    const { fieldErrors } = toValidationErrorFromZod(`Invalid ${origin}.`, result.error.issues);
    throw new ConfigurationError(`Invalid ${origin}.`, { fieldErrors });
  }

  return {
    name: result.data.name,
    scanDirs: result.data['scan-dirs'],
    includes: result.data.includes,
  };
};

export const loadManifest = (manifestPath: string): DiscoveryManifest => {
  if (!existsSync(manifestPath)) {
    throw new ConfigurationError(`Discovery manifest not found at ${manifestPath}.`);
  }
  const manifest = parseManifest(readFileSync(manifestPath, 'utf8'), path.basename(manifestPath));
  debug.manifest(
    `Loaded ${manifestPath}: ${manifest.scanDirs.length} scan dirs, ${manifest.includes.length} includes`
  );
  return manifest;
};

/**
 * Every scan dir must be a directory and every include a file under `rootDir`.
 */
export const verifyManifest = (manifest: DiscoveryManifest, rootDir: string): void => {
  const missing: string[] = [];

  for (const dir of manifest.scanDirs) {
    const target = path.resolve(rootDir, dir);
    if (!existsSync(target) || !statSync(target).isDirectory()) missing.push(dir);
  }
  for (const file of manifest.includes) {
    const target = path.resolve(rootDir, file);
    if (!existsSync(target) || !statSync(target).isFile()) missing.push(file);
  }

  if (missing.length) {
    throw new ConfigurationError(`Discovery manifest names missing paths: ${missing.join(', ')}.`, {
      missing,
    });
  }
};
