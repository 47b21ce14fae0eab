export { GraphBuilder, flattenDeclarations } from './builder';
export type { BuildOptions, BuildResult } from './builder';
export * from './type-decomposer';
export * from './relationship-graph';
export * from './traversal';
export * from './exporters';
