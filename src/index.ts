/**
 * Document relationship graph
 *
 * Detects relationships across a batch of extracted documents, fuses the
 * evidence into a weighted graph and answers cross-document queries over it.
 */

export * from './lib/documents';
export * from './lib/errors';
export * from './lib/graph';
export * from './lib/relationships';
export * from './lib/queries';
export { EventBus } from './lib/utils/event-bus';
export { generateId, isValidUUIDv7 } from './lib/utils/ids';
