import type { VertexId } from '../digraph/vertex';

export type ShortestPathsAlgorithm = 'Dijkstra' | 'Bellman-Ford';

/**
 * Distance from the start node to every node of the graph; unreached nodes hold `Infinity`.
 */
export type DistanceMap<V = VertexId> = ReadonlyMap<V, number>;

export type DijkstraResult<V = VertexId> = {
	readonly algorithmUsed: 'Dijkstra';
	readonly distances: DistanceMap<V>;
};

export type BellmanFordResult<V = VertexId> = {
	readonly algorithmUsed: 'Bellman-Ford';
	readonly distances: DistanceMap<V>;
};

export type ShortestPathsResult<V = VertexId> = DijkstraResult<V> | BellmanFordResult<V>;
