// Behaviors - attach, resolve, and track event handlers on owners

export { Behavior, type BehaviorOptions } from './behavior.js';
export { BehaviorSet, type BehaviorSetOptions } from './set.js';
export { resolveHandler } from './resolve.js';
