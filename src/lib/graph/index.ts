export { DocumentGraph, compareRelationships } from './DocumentGraph';
export { UnionFind } from './UnionFind';
export { maximumSpanningForest } from './spanning';
export type * from './types';
