import { WeightedDiGraphFactory } from '../digraph/factory';
import type { WeightedDiGraph } from '../digraph/graph';
import type { IWeightedDiGraph } from '../digraph/types';
import { InvalidGraphDefinitionError } from '../errors';
import { type GraphDefinition, GraphDefinitionSchema, type GraphEdgeDefinition } from './schema';

// Record parsing drops this key together with its edges
const RESERVED_VERTEX = '__proto__';

export function fromDefinition(data: unknown): WeightedDiGraph<string> {
	if (typeof data === 'object' && data !== null && Object.hasOwn(data, RESERVED_VERTEX)) {
		throw new InvalidGraphDefinitionError([`${RESERVED_VERTEX}: reserved key cannot name a vertex`]);
	}
	const result = GraphDefinitionSchema.safeParse(data);
	if (!result.success) {
		throw new InvalidGraphDefinitionError(
			result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
		);
	}
	const factory = new WeightedDiGraphFactory<string>();
	for (const [from, edges] of Object.entries(result.data)) {
		factory.addVertex(from);
		factory.addEdges(...edges.map(({ weight, target }) => ({ from, target, weight })));
	}
	return factory.build();
}

export function toDefinition(graph: IWeightedDiGraph<string>): GraphDefinition {
	return Object.fromEntries(
		[...graph.nodes()].map((node): [string, GraphEdgeDefinition[]] => [
			node,
			graph.outgoing(node).map(({ weight, target }) => ({ weight, target }))
		])
	);
}
