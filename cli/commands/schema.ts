/**
 * schema command
 * Full input schema of one tool
 */

import { runCommand } from '../utils/run.js';
import type { CommonOptions } from '../utils/run.js';

export function schema(server: string, tool: string, options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({
    success: true,
    server,
    tool,
    data: await client.request({ action: 'schema', server, tool })
  }));
}
