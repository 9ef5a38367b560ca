import type { VertexId } from './vertex';

export type Edge<V = VertexId> = {
	weight: number;
	target: V;
};

export type EdgeDefinition<V = VertexId> = Edge<V> & {
	from: V;
};
