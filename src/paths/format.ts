import { describeVertex } from '../digraph/vertex';
import type { ShortestPathsResult } from './types';

function label(node: unknown): string {
	return typeof node === 'string' ? node : describeVertex(node);
}

/**
 * Renders a result as two lines:
 * ```
 * Algorithm used: Dijkstra
 * Shortest path from A: {A=0, B=2, C=Infinity}
 * ```
 */
export function formatResult<V>(start: V, result: ShortestPathsResult<V>): string {
	const entries = [...result.distances].map(([node, distance]) => `${label(node)}=${distance}`);
	return [
		`Algorithm used: ${result.algorithmUsed}`,
		`Shortest path from ${label(start)}: {${entries.join(', ')}}`
	].join('\n');
}
