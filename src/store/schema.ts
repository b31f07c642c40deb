/**
 * Zod schema of the current persisted graph document (version 5).
 *
 * Node kinds and task states are written capitalized:
 *
 *   - title: Write report
 *     type: Task
 *     state: Partial
 *     metadata: { archived: false, index: 0, alias: rep, parents: [], children: [1] }
 */

import { z } from 'zod';

const handle = z.number().int().nonnegative();

const metadataSchema = z.object({
  archived: z.boolean(),
  index: handle,
  alias: z.string().nullable(),
  parents: z.array(handle),
  children: z.array(handle),
});

export const nodeDocSchema = z.discriminatedUnion('type', [
  z.object({
    title: z.string(),
    type: z.literal('Task'),
    state: z.enum(['None', 'Partial', 'Done']),
    metadata: metadataSchema,
  }),
  z.object({
    title: z.string(),
    type: z.literal('Date'),
    date: z.string(),
    metadata: metadataSchema,
  }),
  z.object({
    title: z.string(),
    type: z.literal('Pseudo'),
    metadata: metadataSchema,
  }),
]);

export const graphDocSchema = z.object({
  nodes: z.array(nodeDocSchema.nullable()),
  roots: z.array(handle),
  archived: z.array(handle),
  dates: z.record(z.string(), handle),
  aliases: z.record(z.string(), handle),
});

export const documentSchema = z.object({
  version: z.literal(5),
  graph: graphDocSchema,
});

/** A saved blueprint: a renumbered subtree whose node 0 is the root. */
export const blueprintSchema = z.object({
  version: z.number().int().positive(),
  title: z.string(),
  author: z.string().nullable().default(null),
  nodes: z.array(nodeDocSchema).min(1),
});

export type NodeDoc = z.infer<typeof nodeDocSchema>;
export type GraphDoc = z.infer<typeof graphDocSchema>;
export type DocumentDoc = z.infer<typeof documentSchema>;
export type BlueprintFileDoc = z.infer<typeof blueprintSchema>;
