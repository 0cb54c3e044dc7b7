/**
 * list command
 * Tool names and descriptions of one server, without input schemas
 */

import { runCommand } from '../utils/run.js';
import type { CommonOptions } from '../utils/run.js';

export function list(server: string, options: CommonOptions): Promise<number> {
  return runCommand(options, async (client) => ({
    success: true,
    server,
    data: await client.request({ action: 'list', server })
  }));
}
