import type { z } from 'zod';

import { encodePayload } from '../lib/json.js';
import type { ResourceRecord } from './types.js';

export const schemaResource = <Schema extends z.ZodType>(
  uri: string,
  schema: Schema,
  payload: z.input<Schema>
): ResourceRecord => ({
  uri,
  mimeType: 'application/json',
  text: encodePayload(schema, payload, `resource ${uri}`),
});

export const textResource = (uri: string, text: string): ResourceRecord => ({
  uri,
  mimeType: 'text/plain',
  text,
});
