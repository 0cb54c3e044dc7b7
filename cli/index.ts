#!/usr/bin/env node
/**
 * mcplex CLI
 * Talks to the session daemon that holds the server connections.
 */

import { Command } from 'commander';
import { VERSION } from '../src/config.js';
import { call } from './commands/call.js';
import type { CallOptions } from './commands/call.js';
import { daemonHealth, daemonReload, daemonStart, daemonStop } from './commands/daemon.js';
import { list } from './commands/list.js';
import { schema } from './commands/schema.js';
import { connect, disconnect, refresh, servers, status } from './commands/servers.js';
import type { CommonOptions } from './utils/run.js';

function exit(code: number): void {
  process.exitCode = code;
}

/**
 * Options every command accepts
 */
function common(command: Command): Command {
  return command
    .option('--session <name>', 'Daemon session name (default: $MCPLEX_SESSION or "default")')
    .option('--config <path>', 'Path to mcp-servers.json, used when the daemon is started')
    .option('--json', 'JSON output mode');
}

const program = new Command();

program
  .name('mcplex')
  .description('Connection manager for MCP tool servers')
  .version(VERSION);

common(program.command('servers'))
  .description('List connected servers and their state')
  .action(async (options: CommonOptions) => exit(await servers(options)));

common(program.command('list <server>'))
  .description('List the tools of a server')
  .action(async (server: string, options: CommonOptions) => exit(await list(server, options)));

common(program.command('schema <server> <tool>'))
  .description('Show the input schema of a tool')
  .action(async (server: string, tool: string, options: CommonOptions) => exit(await schema(server, tool, options)));

common(program.command('call <server> <tool>'))
  .description('Call a tool')
  .option('--params <json>', 'Tool arguments (JSON object)')
  .option('--timeout <ms>', 'Request timeout in milliseconds')
  .action(async (server: string, tool: string, options: CallOptions) => exit(await call(server, tool, options)));

common(program.command('status [server]'))
  .description('Show connection status of one server or all of them')
  .action(async (server: string | undefined, options: CommonOptions) => exit(await status(server, options)));

common(program.command('refresh <server>'))
  .description('Re-discover the tools of a server')
  .action(async (server: string, options: CommonOptions) => exit(await refresh(server, options)));

common(program.command('connect <server>'))
  .description('Connect a server listed in mcp-servers.json')
  .action(async (server: string, options: CommonOptions) => exit(await connect(server, options)));

common(program.command('disconnect <server>'))
  .description('Disconnect a server')
  .action(async (server: string, options: CommonOptions) => exit(await disconnect(server, options)));

// Daemon management
const daemonCmd = program.command('daemon').description('Manage the mcplex daemon');

common(daemonCmd.command('start'))
  .description('Start the daemon')
  .action(async (options: CommonOptions) => exit(await daemonStart(options)));

common(daemonCmd.command('stop'))
  .description('Stop the daemon')
  .action(async (options: CommonOptions) => exit(await daemonStop(options)));

common(daemonCmd.command('reload'))
  .description('Reload mcp-servers.json and reconnect')
  .action(async (options: CommonOptions) => exit(await daemonReload(options)));

common(daemonCmd.command('health'))
  .description('Check that the daemon is up')
  .action(async (options: CommonOptions) => exit(await daemonHealth(options)));

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
