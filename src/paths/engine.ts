import type { IWeightedDiGraph } from '../digraph/types';
import { NegativeWeightError, UnknownStartNodeError } from '../errors';
import { getDefaultLogger } from '../logger';
import { bellmanFord } from './bellman-ford';
import { dijkstra } from './dijkstra';
import { type AlgorithmChoice, parseShortestPathsOptions, type ShortestPathsOptions } from './options';
import type { ShortestPathsAlgorithm, ShortestPathsResult } from './types';

export function selectAlgorithm(
	choice: AlgorithmChoice,
	hasNegativeEdge: boolean
): ShortestPathsAlgorithm {
	switch (choice) {
		case 'dijkstra':
			if (hasNegativeEdge) {
				throw new NegativeWeightError();
			}
			return 'Dijkstra';
		case 'bellman-ford':
			return 'Bellman-Ford';
		case 'auto':
			return hasNegativeEdge ? 'Bellman-Ford' : 'Dijkstra';
	}
}

/**
 * Computes the distance from `start` to every node of `graph`.
 *
 * Dijkstra runs when no edge is negative, Bellman-Ford otherwise, unless `options.algorithm`
 * forces one of them. `algorithmUsed` always names the algorithm that actually ran.
 */
export function shortestPaths<V>(
	graph: IWeightedDiGraph<V>,
	start: V,
	options: ShortestPathsOptions = {}
): ShortestPathsResult<V> {
	const { logger = getDefaultLogger(), ...rest } = options;
	const { algorithm: choice, detectNegativeCycles } = parseShortestPathsOptions(rest);

	if (!graph.nodes().has(start)) {
		throw new UnknownStartNodeError(start);
	}

	// Evaluated once, the dispatch and the result label both come from this value
	const hasNegativeEdge = graph.hasNegativeEdge();
	const algorithm = selectAlgorithm(choice, hasNegativeEdge);
	logger.debug('Computing shortest paths', {
		algorithm,
		choice,
		hasNegativeEdge,
		nodes: graph.size,
		edges: graph.edgeCount
	});

	if (algorithm === 'Dijkstra') {
		return Object.freeze({ algorithmUsed: algorithm, distances: dijkstra(graph, start) });
	}
	return Object.freeze({
		algorithmUsed: algorithm,
		distances: bellmanFord(graph, start, { detectNegativeCycles, logger })
	});
}
