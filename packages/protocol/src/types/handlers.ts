// Handler descriptors - declared, not-yet-resolved references to event code

import type { EventName, Handler } from './common.js';

/**
 * A method on the behavior itself, bound to the behavior when attached.
 */
export type MethodHandlerDescriptor = {
  kind: 'method';
  method: string;
};

/**
 * A method on an arbitrary object, bound to that object when attached.
 */
export type BoundHandlerDescriptor = {
  kind: 'bound';
  target: object;
  method: string;
};

/**
 * A free function, subscribed as-is.
 */
export type CallableHandlerDescriptor<TEvent = unknown> = {
  kind: 'callable';
  handler: Handler<TEvent>;
};

export type HandlerDescriptor<TEvent = unknown> =
  | MethodHandlerDescriptor
  | BoundHandlerDescriptor
  | CallableHandlerDescriptor<TEvent>;

export type HandlerDescriptorKind = HandlerDescriptor['kind'];

/**
 * What a behavior may declare for one event.
 *
 * A string is shorthand for a method on the behavior; a function is
 * shorthand for a callable descriptor.
 */
export type DeclaredHandler<TEvent = unknown> =
  | string
  | Handler<TEvent>
  | HandlerDescriptor<TEvent>;

/**
 * Event name to handler declarations, as returned by `Behavior.events()`.
 *
 * Records iterate in insertion order except for integer-like keys, which
 * JavaScript moves to the front. Use a Map when those names must keep
 * their declared position.
 */
export type EventMap<TEvent = unknown> =
  | Readonly<Record<EventName, DeclaredHandler<TEvent>>>
  | ReadonlyMap<EventName, DeclaredHandler<TEvent>>;

export function methodHandler(method: string): MethodHandlerDescriptor {
  return { kind: 'method', method };
}

export function boundHandler<T extends object>(
  target: T,
  method: Extract<keyof T, string>
): BoundHandlerDescriptor {
  return { kind: 'bound', target, method };
}

export function callableHandler<TEvent>(
  handler: Handler<TEvent>
): CallableHandlerDescriptor<TEvent> {
  return { kind: 'callable', handler };
}

const DESCRIPTOR_KINDS: readonly HandlerDescriptorKind[] = ['method', 'bound', 'callable'];

/**
 * Check whether a value is a well-formed handler descriptor object.
 */
export function isHandlerDescriptor(value: unknown): value is HandlerDescriptor {
  if (typeof value !== 'object' || value === null) {
    return false;
  }

  const kind: unknown = Reflect.get(value, 'kind');
  if (typeof kind !== 'string' || !DESCRIPTOR_KINDS.some((k) => k === kind)) {
    return false;
  }

  switch (kind) {
    case 'method':
      return typeof Reflect.get(value, 'method') === 'string';
    case 'bound': {
      const target: unknown = Reflect.get(value, 'target');
      return (
        (typeof target === 'object' || typeof target === 'function') &&
        target !== null &&
        typeof Reflect.get(value, 'method') === 'string'
      );
    }
    default:
      return typeof Reflect.get(value, 'handler') === 'function';
  }
}

/**
 * Expand shorthand declarations into their descriptor form.
 *
 * @returns The descriptor, or null if the value is not a declaration
 */
export function normalizeDeclaredHandler<TEvent>(
  declared: DeclaredHandler<TEvent>
): HandlerDescriptor<TEvent> | null {
  if (typeof declared === 'string') {
    return methodHandler(declared);
  }
  if (typeof declared === 'function') {
    return callableHandler(declared);
  }
  return isHandlerDescriptor(declared) ? declared : null;
}

/**
 * Iterate an event map as ordered [eventName, declaration] pairs.
 */
export function eventMapEntries<TEvent>(
  map: EventMap<TEvent>
): Array<[EventName, DeclaredHandler<TEvent>]> {
  if (isMapEventMap(map)) {
    return Array.from(map.entries());
  }
  return Object.entries(map);
}

function isMapEventMap<TEvent>(
  map: EventMap<TEvent>
): map is ReadonlyMap<EventName, DeclaredHandler<TEvent>> {
  return map instanceof Map;
}
