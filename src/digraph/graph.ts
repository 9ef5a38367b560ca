import { InvalidWeightError, UnknownNodeError } from '../errors';
import type { Edge } from './edge';
import type { IWeightedDiGraph } from './types';
import type { VertexId } from './vertex';

const NO_EDGES: readonly never[] = Object.freeze([]);

export class WeightedDiGraph<V = VertexId> implements IWeightedDiGraph<V> {
	readonly #adjacency = new Map<V, readonly Edge<V>[]>();
	readonly #nodes = new Set<V>();
	readonly #edgeCount: number;
	readonly #hasNegativeEdge: boolean;

	constructor(adjacency: Iterable<readonly [V, Iterable<Edge<V>>]>) {
		let edgeCount = 0;
		let hasNegativeEdge = false;
		for (const [node, edges] of adjacency) {
			const copy = [...edges].map(({ weight, target }) => {
				if (!Number.isFinite(weight)) {
					throw new InvalidWeightError(node, target, weight);
				}
				return Object.freeze({ weight, target });
			});
			this.#adjacency.set(node, Object.freeze(copy));
			this.#nodes.add(node);
			edgeCount += copy.length;
			hasNegativeEdge ||= copy.some((edge) => edge.weight < 0);
		}
		// Targets without outgoing edges still get a distance
		for (const edges of this.#adjacency.values()) {
			for (const edge of edges) {
				this.#nodes.add(edge.target);
			}
		}
		this.#edgeCount = edgeCount;
		this.#hasNegativeEdge = hasNegativeEdge;
	}

	get size(): number {
		return this.#nodes.size;
	}

	get edgeCount(): number {
		return this.#edgeCount;
	}

	public nodes(): ReadonlySet<V> {
		return this.#nodes;
	}

	public hasNode(node: V): boolean {
		return this.#nodes.has(node);
	}

	public outgoing(node: V): readonly Edge<V>[] {
		if (!this.#nodes.has(node)) {
			throw new UnknownNodeError(node);
		}
		return this.#adjacency.get(node) ?? NO_EDGES;
	}

	public *edges(): IterableIterator<[V, Edge<V>]> {
		for (const [node, edges] of this.#adjacency) {
			for (const edge of edges) {
				yield [node, edge];
			}
		}
	}

	public hasNegativeEdge(): boolean {
		return this.#hasNegativeEdge;
	}
}
