import _ from 'lodash';
import type { IWeightedDiGraph } from '../digraph/types';
import { distanceOf, initialDistances } from './distances';

/**
 * Dijkstra without a priority queue: the next node to settle is found by a linear scan
 * over the unvisited set, which keeps the whole run at O(V² + E).
 *
 * Among equally distant nodes the one that comes first in `graph.nodes()` is settled first.
 * Callers must make sure the graph has no negative edge.
 */
export function dijkstra<V>(graph: IWeightedDiGraph<V>, start: V): Map<V, number> {
	const distances = initialDistances(graph, start);
	const unvisited = new Set(graph.nodes());

	while (unvisited.size > 0) {
		// Pairs keep an `undefined` vertex apart from the empty-collection result
		const closest = _.minBy(
			[...unvisited].map((node) => [node, distanceOf(distances, node)] as const),
			([, distance]) => distance
		);
		if (!closest) {
			break;
		}
		const [node, distance] = closest;
		for (const { weight, target } of graph.outgoing(node)) {
			if (distance + weight < distanceOf(distances, target)) {
				distances.set(target, distance + weight);
			}
		}
		unvisited.delete(node);
	}

	return distances;
}
