import config from 'config';
import { z } from 'zod';

import { ConfigurationError } from './lib/errors.js';
import { toValidationErrorFromZod } from './mcp/errors.js';

const identifierSchema = z
  .string()
  .regex(/^[a-z][a-z0-9]*$/, { message: 'Must be a short lowercase identifier.' });

export const extensionSettingsSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  scheme: identifierSchema,
  framework: identifierSchema,
  manifestPath: z.string().min(1),
  instructions: z.string().optional(),
});

export type ExtensionSettings = z.infer<typeof extensionSettingsSchema>;

export const parseExtensionSettings = (value: unknown): ExtensionSettings => {
  const result = extensionSettingsSchema.safeParse(value);
  if (!result.success) {
    const { fieldErrors } = toValidationErrorFromZod('Invalid extension settings.', result.error.issues);
    throw new ConfigurationError('Invalid extension settings.', { fieldErrors });
  }
  return result.data;
};

export const getExtensionSettings = (): ExtensionSettings => {
  if (!config.has('extension')) {
    throw new ConfigurationError('Extension configuration not found.');
  }
  return parseExtensionSettings(config.get<unknown>('extension'));
};
