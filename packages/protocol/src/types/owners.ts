// Owner capability - what a behavior needs from the object it extends

import type { EventName, Handler } from './common.js';

/**
 * The event-subscription capability a behavior consumes from its owner.
 *
 * Owners MUST:
 * - invoke handlers for the same event in registration order
 * - accept duplicate registrations of distinct callables
 * - match `unsubscribe` by identity of the exact value passed to `subscribe`
 * - treat `unsubscribe` of an unknown pair as a no-op
 */
export interface EventOwner<TEvent = unknown> {
  subscribe(eventName: EventName, handler: Handler<TEvent>): void;
  unsubscribe(eventName: EventName, handler: Handler<TEvent>): void;
}

/**
 * A handler a behavior actually subscribed on its owner.
 * The handler is the exact value passed to `subscribe`.
 */
export type Registration<TEvent = unknown> = {
  readonly eventName: EventName;
  readonly handler: Handler<TEvent>;
};
