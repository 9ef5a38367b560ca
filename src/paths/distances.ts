import type { IWeightedDiGraph } from '../digraph/types';
import { UnknownStartNodeError } from '../errors';

export function initialDistances<V>(graph: IWeightedDiGraph<V>, start: V): Map<V, number> {
	if (!graph.hasNode(start)) {
		throw new UnknownStartNodeError(start);
	}
	const distances = new Map<V, number>();
	for (const node of graph.nodes()) {
		distances.set(node, Infinity);
	}
	distances.set(start, 0);
	return distances;
}

export function distanceOf<V>(distances: ReadonlyMap<V, number>, node: V): number {
	return distances.get(node) ?? Infinity;
}
