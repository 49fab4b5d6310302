// Handler resolution - turns declarations into the callables an owner stores

import { normalizeDeclaredHandler } from '@attachable/protocol';
import type { DeclaredHandler, EventName, Handler } from '@attachable/protocol';
import { UnresolvedHandlerError } from '../errors.js';

/**
 * Resolve one declared handler against the behavior that declared it.
 *
 * Method descriptors become a new wrapper that calls the method with the
 * right receiver. Each call returns a distinct value, so callers must keep
 * the result to unsubscribe it later.
 *
 * @throws UnresolvedHandlerError if the declaration names a missing method
 *   or is not a recognized declaration
 */
export function resolveHandler<TEvent>(
  behavior: object,
  eventName: EventName,
  declared: DeclaredHandler<TEvent>
): Handler<TEvent> {
  const descriptor = normalizeDeclaredHandler(declared);
  if (!descriptor) {
    return unresolved(eventName, `unrecognized handler declaration (${typeof declared})`);
  }

  switch (descriptor.kind) {
    case 'method':
      return bindMethod(behavior, descriptor.method, eventName);
    case 'bound':
      return bindMethod(descriptor.target, descriptor.method, eventName);
    case 'callable':
      return descriptor.handler;
  }
}

function bindMethod<TEvent>(target: object, method: string, eventName: EventName): Handler<TEvent> {
  if (method === 'constructor') {
    return unresolved(eventName, `"constructor" on ${describeTarget(target)} is not an event handler`);
  }

  const candidate: unknown = Reflect.get(target, method);
  if (typeof candidate !== 'function') {
    return unresolved(eventName, `${describeTarget(target)} has no method "${method}"`);
  }

  return (event: TEvent) => {
    Reflect.apply(candidate, target, [event]);
  };
}

function unresolved(eventName: EventName, reason: string): never {
  throw new UnresolvedHandlerError(eventName, reason);
}

function describeTarget(target: object): string {
  const name = target.constructor?.name;
  return name && name !== 'Object' ? name : 'target';
}
