import { InvalidWeightError } from '../errors';
import type { Edge, EdgeDefinition } from './edge';
import { WeightedDiGraph } from './graph';
import type { VertexId } from './vertex';

export class WeightedDiGraphFactory<V = VertexId> {
	readonly #adjacency = new Map<V, Edge<V>[]>();

	public addVertex(...ids: V[]): void {
		for (const id of ids) {
			if (!this.#adjacency.has(id)) {
				this.#adjacency.set(id, []);
			}
		}
	}

	public addEdge(from: V, target: V, weight: number): void {
		if (!Number.isFinite(weight)) {
			throw new InvalidWeightError(from, target, weight);
		}
		let edges = this.#adjacency.get(from);
		if (!edges) {
			edges = [];
			this.#adjacency.set(from, edges);
		}
		// Parallel edges are kept as-is, each one is relaxed on its own
		edges.push({ weight, target });
	}

	public addEdges(...edges: EdgeDefinition<V>[]): void {
		for (const { from, target, weight } of edges) {
			this.addEdge(from, target, weight);
		}
	}

	public build(): WeightedDiGraph<V> {
		// The graph copies the adjacency, so the factory stays usable afterwards
		return new WeightedDiGraph(this.#adjacency);
	}
}
