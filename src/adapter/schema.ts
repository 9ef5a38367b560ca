import { z } from 'zod';

export const EdgeDefinitionSchema = z.object({
	weight: z.number().finite(),
	target: z.string().min(1)
});

/**
 * Adjacency record: each key is a source vertex, each value its outgoing edges in order.
 *
 * ```json
 * { "A": [{ "weight": 2, "target": "B" }], "B": [] }
 * ```
 */
export const GraphDefinitionSchema = z.record(z.string().min(1), z.array(EdgeDefinitionSchema));

export type GraphEdgeDefinition = z.infer<typeof EdgeDefinitionSchema>;
export type GraphDefinition = z.infer<typeof GraphDefinitionSchema>;
