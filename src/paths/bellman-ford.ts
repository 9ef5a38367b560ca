import type { IWeightedDiGraph } from '../digraph/types';
import { NegativeCycleError } from '../errors';
import type { Logger } from '../logger';
import { distanceOf, initialDistances } from './distances';

export type BellmanFordOptions = {
	detectNegativeCycles?: boolean;
	logger?: Logger;
};

/**
 * Bellman-Ford over at most `|V| - 1` relaxation rounds.
 *
 * A negative cycle reachable from `start` leaves the distances under-relaxed after the last round
 * unless `detectNegativeCycles` is set, in which case one more round runs and any improvement
 * throws a `NegativeCycleError`.
 */
export function bellmanFord<V>(
	graph: IWeightedDiGraph<V>,
	start: V,
	options: BellmanFordOptions = {}
): Map<V, number> {
	const distances = initialDistances(graph, start);
	const rounds = graph.size - 1;

	for (let round = 0; round < rounds; round++) {
		if (!relaxAll(graph, distances)) {
			// Nothing changed, later rounds would not change anything either
			break;
		}
	}

	if (options.detectNegativeCycles && relaxAll(graph, distances)) {
		options.logger?.warn('Negative cycle detected', { rounds });
		throw new NegativeCycleError(start);
	}

	return distances;
}

function relaxAll<V>(graph: IWeightedDiGraph<V>, distances: Map<V, number>): boolean {
	let changed = false;
	for (const node of graph.nodes()) {
		for (const { weight, target } of graph.outgoing(node)) {
			// Re-read on every edge: a self loop may have just lowered the source
			const candidate = distanceOf(distances, node) + weight;
			if (candidate < distanceOf(distances, target)) {
				distances.set(target, candidate);
				changed = true;
			}
		}
	}
	return changed;
}
