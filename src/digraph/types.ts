import type { Edge } from './edge';
import type { VertexId } from './vertex';

/**
 * Read-only view of a directed graph with weighted edges.
 *
 * A vertex is part of the graph when it owns outgoing edges or is the target of one,
 * so a sink never needs to be registered explicitly.
 */
export interface IWeightedDiGraph<V = VertexId> {
	readonly size: number;
	readonly edgeCount: number;

	nodes(): ReadonlySet<V>;
	hasNode(node: V): boolean;
	/**
	 * @throws UnknownNodeError when `node` is not part of the graph
	 */
	outgoing(node: V): readonly Edge<V>[];
	edges(): IterableIterator<[V, Edge<V>]>;
	hasNegativeEdge(): boolean;
}
