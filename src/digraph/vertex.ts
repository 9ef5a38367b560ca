import stringify from 'safe-stable-stringify';

export type VertexId = string;

export function describeVertex(vertex: unknown): string {
	return stringify(vertex) ?? String(vertex);
}
