// Runtime error types

import type { EventMapValidationError } from '@attachable/protocol';

/**
 * Base class for all runtime errors.
 * Provides structured error information for debugging and logging.
 */
export class RuntimeError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'RuntimeError';
    this.code = code;
  }
}

/**
 * Validation error for malformed or invalid input.
 */
export class ValidationError extends RuntimeError {
  readonly field?: string;
  readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    options?: { field?: string; details?: Record<string, unknown> }
  ) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
    this.field = options?.field;
    this.details = options?.details;
  }
}

/**
 * Error when attaching a behavior that already has an owner.
 * Detach it first.
 */
export class AlreadyAttachedError extends RuntimeError {
  readonly behaviorName: string;

  constructor(behaviorName: string) {
    super('ALREADY_ATTACHED', `Behavior "${behaviorName}" is already attached to an owner`);
    this.name = 'AlreadyAttachedError';
    this.behaviorName = behaviorName;
  }
}

/**
 * Error when a declared handler cannot be turned into a callable.
 */
export class UnresolvedHandlerError extends RuntimeError {
  readonly eventName: string;
  readonly reason: string;

  constructor(eventName: string, reason: string) {
    super('UNRESOLVED_HANDLER', `Cannot resolve handler for event "${eventName}": ${reason}`);
    this.name = 'UnresolvedHandlerError';
    this.eventName = eventName;
    this.reason = reason;
  }
}

/**
 * Error when a behavior declares a malformed event map.
 */
export class InvalidEventMapError extends ValidationError {
  readonly behaviorName: string;
  readonly errors: EventMapValidationError[];

  constructor(behaviorName: string, errors: EventMapValidationError[]) {
    super(
      `Behavior "${behaviorName}" declares an invalid event map: ${errors
        .map((e) => `${e.path}: ${e.message}`)
        .join('; ')}`,
      { field: 'events', details: { behaviorName, errors } }
    );
    this.name = 'InvalidEventMapError';
    this.behaviorName = behaviorName;
    this.errors = errors;
  }
}

/**
 * An issue found while parsing behavior configuration.
 */
export type ConfigIssue = {
  path: string;
  message: string;
};

/**
 * Error when behavior configuration fails to parse.
 */
export class InvalidBehaviorConfigError extends ValidationError {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      `Invalid behavior config: ${issues
        .map((i) => (i.path ? `${i.path}: ${i.message}` : i.message))
        .join('; ')}`,
      { field: 'config', details: { issues } }
    );
    this.name = 'InvalidBehaviorConfigError';
    this.issues = issues;
  }
}
