import { describe, expect, it } from 'vitest';
import { InvalidWeightError, UnknownNodeError, WeightedDiGraph } from '../../src/index';

describe('WeightedDiGraph', () => {
	describe('nodes', () => {
		it('should include edge targets that own no edges', () => {
			const graph = new WeightedDiGraph([['A', [{ weight: 1, target: 'B' }]]]);
			expect([...graph.nodes()]).toEqual(['A', 'B']);
			expect(graph.size).toBe(2);
			expect(graph.hasNode('B')).toBe(true);
		});
		it('should list sources in insertion order before targets', () => {
			const graph = new WeightedDiGraph([
				['C', [{ weight: 1, target: 'X' }]],
				['A', [{ weight: 1, target: 'C' }, { weight: 1, target: 'Y' }]]
			]);
			expect([...graph.nodes()]).toEqual(['C', 'A', 'X', 'Y']);
		});
		it('should support non-string vertex labels', () => {
			const graph = new WeightedDiGraph<number>([[1, [{ weight: 3, target: 2 }]]]);
			expect([...graph.nodes()]).toEqual([1, 2]);
			expect(graph.outgoing(1)).toEqual([{ weight: 3, target: 2 }]);
		});
	});
	describe('outgoing', () => {
		it('should return edges in the order they were given, parallel edges included', () => {
			const graph = new WeightedDiGraph([
				[
					'A',
					[
						{ weight: 5, target: 'B' },
						{ weight: 1, target: 'B' },
						{ weight: 2, target: 'C' }
					]
				]
			]);
			expect(graph.outgoing('A')).toEqual([
				{ weight: 5, target: 'B' },
				{ weight: 1, target: 'B' },
				{ weight: 2, target: 'C' }
			]);
			expect(graph.edgeCount).toBe(3);
		});
		it('should return no edges for a sink', () => {
			const graph = new WeightedDiGraph([['A', [{ weight: 1, target: 'B' }]]]);
			expect(graph.outgoing('B')).toEqual([]);
		});
		it('should fail for a node outside the graph', () => {
			const graph = new WeightedDiGraph([['A', [{ weight: 1, target: 'B' }]]]);
			expect(() => graph.outgoing('Z')).toThrowError(UnknownNodeError);
			expect(() => graph.outgoing('Z')).toThrowError('Unknown node "Z": not present in the graph');
		});
	});
	describe('weights', () => {
		it('should fail on a NaN weight', () => {
			expect(() => new WeightedDiGraph([['A', [{ weight: NaN, target: 'B' }]]])).toThrowError(
				'Invalid weight NaN for edge "A" -> "B": weight must be a finite number'
			);
		});
		it('should fail on an infinite weight', () => {
			expect(
				() =>
					new WeightedDiGraph([
						['A', [{ weight: -Infinity, target: 'B' }]],
						['B', [{ weight: 1, target: 'C' }]]
					])
			).toThrowError(InvalidWeightError);
			expect(() => new WeightedDiGraph([['A', [{ weight: Infinity, target: 'B' }]]])).toThrowError(
				InvalidWeightError
			);
		});
	});
	describe('hasNegativeEdge', () => {
		it('should be false when every weight is non-negative', () => {
			const graph = new WeightedDiGraph([['A', [{ weight: 0, target: 'B' }]]]);
			expect(graph.hasNegativeEdge()).toBe(false);
		});
		it('should be true when any weight is negative', () => {
			const graph = new WeightedDiGraph([
				['A', [{ weight: 1, target: 'B' }]],
				['B', [{ weight: -0.5, target: 'C' }]]
			]);
			expect(graph.hasNegativeEdge()).toBe(true);
		});
	});
	describe('immutability', () => {
		it('should not see later changes to its source adjacency', () => {
			const edges = [{ weight: 1, target: 'B' }];
			const adjacency = new Map([['A', edges]]);
			const graph = new WeightedDiGraph(adjacency);
			edges.push({ weight: -1, target: 'C' });
			edges[0].weight = 100;
			adjacency.set('D', []);
			expect(graph.outgoing('A')).toEqual([{ weight: 1, target: 'B' }]);
			expect(graph.hasNode('C')).toBe(false);
			expect(graph.hasNode('D')).toBe(false);
			expect(graph.hasNegativeEdge()).toBe(false);
		});
		it('should expose frozen edge lists', () => {
			const graph = new WeightedDiGraph([['A', [{ weight: 1, target: 'B' }]]]);
			expect(Object.isFrozen(graph.outgoing('A'))).toBe(true);
			expect(Object.isFrozen(graph.outgoing('A')[0])).toBe(true);
		});
	});
	it('should iterate over every edge with its source', () => {
		const graph = new WeightedDiGraph([
			['A', [{ weight: 1, target: 'B' }]],
			['B', [{ weight: 2, target: 'A' }, { weight: 3, target: 'C' }]]
		]);
		expect([...graph.edges()]).toEqual([
			['A', { weight: 1, target: 'B' }],
			['B', { weight: 2, target: 'A' }],
			['B', { weight: 3, target: 'C' }]
		]);
	});
});
