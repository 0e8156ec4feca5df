export * from './digraph/dump';
export * from './digraph/logger';
export * from './digraph/options';
export * from './digraph/order';
export * from './digraph/registry';
export * from './digraph/types';
export * from './digraph/weighted-graph';
