#!/usr/bin/env node
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import debug from '../../util/debug.js';
import { bootstrapExtension } from '../bootstrap.js';

const transport = new StdioServerTransport();

const { server, settings } = bootstrapExtension();

await server.connect(transport);
debug.app(`${settings.name} listening on stdio`);
