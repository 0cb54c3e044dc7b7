/**
 * call command
 */

import { z } from 'zod';
import { InvalidParamsError } from '../errors.js';
import { printFailure, runCommand } from '../utils/run.js';
import type { CommonOptions } from '../utils/run.js';

export interface CallOptions extends CommonOptions {
  params?: string;
  timeout?: string;
}

// Room for the daemon to report its own timeout before the socket gives up
const SOCKET_GRACE_MS = 5000;

const ParamsSchema = z.record(z.unknown());

export function parseParams(raw?: string): Record<string, unknown> {
  if (raw === undefined) {
    return {};
  }
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new InvalidParamsError('--params must be valid JSON');
  }
  const parsed = ParamsSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidParamsError('--params must be a JSON object');
  }
  return parsed.data;
}

export function parseTimeout(raw?: string): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new InvalidParamsError('--timeout must be a positive number of milliseconds');
  }
  return value;
}

export async function call(server: string, tool: string, options: CallOptions): Promise<number> {
  let args: Record<string, unknown>;
  let timeoutMs: number | undefined;
  try {
    args = parseParams(options.params);
    timeoutMs = parseTimeout(options.timeout);
  } catch (error) {
    return printFailure(error, options);
  }

  return runCommand(
    options,
    async (client) => ({
      success: true,
      server,
      tool,
      data: await client.request({ action: 'call', server, tool, arguments: args, timeoutMs })
    }),
    { timeoutMs: timeoutMs === undefined ? undefined : timeoutMs + SOCKET_GRACE_MS }
  );
}
