// Event map validation
//
// Checks a declared event map is well-formed before any handler
// is resolved against a behavior or registered on an owner.

import { eventMapEntries, isHandlerDescriptor } from '../types/handlers.js';
import type { EventMap } from '../types/handlers.js';

/**
 * Result of validating an event map
 */
export type EventMapValidationResult = {
  valid: boolean;
  errors: EventMapValidationError[];
};

export type EventMapValidationError = {
  path: string;
  message: string;
  code: EventMapValidationErrorCode;
};

export type EventMapValidationErrorCode =
  | 'INVALID_TYPE'
  | 'INVALID_EVENT_NAME'
  | 'INVALID_DESCRIPTOR';

/**
 * Validate an event map declaration.
 *
 * Accepts a plain object or a Map. Each entry must have a non-blank event
 * name and a declaration that is a method name, a function, or a handler
 * descriptor.
 */
export function validateEventMap(value: unknown): EventMapValidationResult {
  const errors: EventMapValidationError[] = [];

  if (!isEventMapShape(value)) {
    errors.push({
      path: '',
      message: 'Event map must be an object or a Map',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors };
  }

  for (const [eventName, declared] of eventMapEntries<unknown>(value)) {
    const path = `events.${eventName}`;

    if (typeof eventName !== 'string' || eventName.trim().length === 0) {
      errors.push({
        path,
        message: 'Event name must be a non-empty string',
        code: 'INVALID_EVENT_NAME',
      });
    }

    const methodName = declaredMethodName(declared);
    if (methodName !== undefined) {
      if (methodName.trim().length === 0) {
        errors.push({
          path,
          message: 'Method name must be a non-empty string',
          code: 'INVALID_DESCRIPTOR',
        });
      }
      continue;
    }

    if (typeof declared === 'function' || isHandlerDescriptor(declared)) {
      continue;
    }

    errors.push({
      path,
      message: `Unrecognized handler declaration (${describeValue(declared)})`,
      code: 'INVALID_DESCRIPTOR',
    });
  }

  return { valid: errors.length === 0, errors };
}

/**
 * The method a declaration names: the string shorthand, or the `method`
 * field of a method or bound descriptor.
 */
function declaredMethodName(declared: unknown): string | undefined {
  if (typeof declared === 'string') {
    return declared;
  }
  if (isHandlerDescriptor(declared) && declared.kind !== 'callable') {
    return declared.method;
  }
  return undefined;
}

function isEventMapShape(value: unknown): value is EventMap<unknown> {
  if (value instanceof Map) {
    return true;
  }
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  return typeof value;
}
