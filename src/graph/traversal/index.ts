export * from './types';
export { related, TraversalOptionsError } from './related-nodes';
