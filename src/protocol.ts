/**
 * Daemon socket protocol (newline-delimited JSON)
 *
 * - Command: {"id":"1","action":"list","server":"docs"}
 * - Response: {"id":"1","success":true,"data":{...}}
 */

import { z } from 'zod';

const Id = z.string().min(1);
const Server = z.string().min(1);
const Tool = z.string().min(1);

export const DaemonCommandSchema = z.discriminatedUnion('action', [
  z.object({ id: Id, action: z.literal('ping') }),
  z.object({ id: Id, action: z.literal('servers') }),
  z.object({ id: Id, action: z.literal('list'), server: Server }),
  z.object({ id: Id, action: z.literal('schema'), server: Server, tool: Tool }),
  z.object({
    id: Id,
    action: z.literal('call'),
    server: Server,
    tool: Tool,
    arguments: z.record(z.unknown()).default({}),
    timeoutMs: z.number().int().positive().optional()
  }),
  z.object({ id: Id, action: z.literal('status'), server: Server.optional() }),
  z.object({ id: Id, action: z.literal('refresh'), server: Server }),
  z.object({ id: Id, action: z.literal('connect'), server: Server }),
  z.object({ id: Id, action: z.literal('disconnect'), server: Server }),
  z.object({ id: Id, action: z.literal('reload') }),
  z.object({ id: Id, action: z.literal('shutdown') })
]);

export type DaemonCommand = z.output<typeof DaemonCommandSchema>;
export type DaemonAction = DaemonCommand['action'];

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/**
 * A command before the client assigns its id
 */
export type DaemonRequest = DistributiveOmit<z.input<typeof DaemonCommandSchema>, 'id'>;

export const DaemonResponseSchema = z.object({
  id: z.string().nullable(),
  success: z.boolean(),
  data: z.unknown().optional(),
  error: z.string().optional(),
  errorType: z.string().optional()
});

export type DaemonResponse = z.output<typeof DaemonResponseSchema>;
