export { CrossDocumentQueryEngine, satisfiesRule } from './CrossDocumentQueryEngine';
export { matchesPredicate } from './predicates';
export * from './schemas';
export type * from './types';
