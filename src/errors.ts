import { describeVertex } from './digraph/vertex';

export class ShortestPathsError extends Error {
	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

export class UnknownStartNodeError extends ShortestPathsError {
	constructor(public readonly node: unknown) {
		super(`Unknown start node ${describeVertex(node)}: not present in the graph`);
	}
}

export class UnknownNodeError extends ShortestPathsError {
	constructor(public readonly node: unknown) {
		super(`Unknown node ${describeVertex(node)}: not present in the graph`);
	}
}

export class NegativeWeightError extends ShortestPathsError {
	constructor() {
		super('Dijkstra requires non-negative edge weights, but the graph has a negative edge');
	}
}

export class NegativeCycleError extends ShortestPathsError {
	constructor(public readonly start: unknown) {
		super(`Negative cycle reachable from ${describeVertex(start)}: shortest paths are unbounded`);
	}
}

export class InvalidWeightError extends ShortestPathsError {
	constructor(
		public readonly from: unknown,
		public readonly target: unknown,
		public readonly weight: number
	) {
		super(
			`Invalid weight ${weight} for edge ${describeVertex(from)} -> ${describeVertex(target)}: weight must be a finite number`
		);
	}
}

export class InvalidGraphDefinitionError extends ShortestPathsError {
	constructor(public readonly issues: string[]) {
		super(`Invalid graph definition: ${issues.join('; ')}`);
	}
}

export class InvalidLogLevelError extends ShortestPathsError {
	constructor(
		public readonly variable: string,
		public readonly value: string,
		allowed: readonly string[]
	) {
		super(`Invalid ${variable} "${value}": expected one of ${allowed.join(', ')}`);
	}
}

export class InvalidOptionsError extends ShortestPathsError {
	constructor(public readonly issues: string[]) {
		super(`Invalid shortest paths options: ${issues.join('; ')}`);
	}
}
