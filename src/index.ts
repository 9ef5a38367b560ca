export * from './adapter/definition';
export * from './adapter/schema';
export * from './digraph/edge';
export * from './digraph/factory';
export * from './digraph/graph';
export * from './digraph/types';
export * from './digraph/vertex';
export * from './errors';
export * from './logger';
export * from './paths/bellman-ford';
export * from './paths/dijkstra';
export * from './paths/engine';
export * from './paths/format';
export * from './paths/options';
export * from './paths/types';
