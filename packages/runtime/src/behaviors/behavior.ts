// Behavior - attachable extension unit for an event-capable owner
//
// A behavior extends an owner without modifying it:
// 1. Holds a non-owning back-reference to the owner while attached
// 2. Declares event handlers via events()
// 3. Subscribes the resolved handlers on attach and records exactly what it subscribed
// 4. Unsubscribes those same values on detach

import { eventMapEntries, validateEventMap } from '@attachable/protocol';
import type {
  BehaviorConfig,
  EventMap,
  EventOwner,
  Registration,
} from '@attachable/protocol';
import { resolveBehaviorConfig, type BehaviorConfigInput } from '../config.js';
import { AlreadyAttachedError, InvalidEventMapError } from '../errors.js';
import { consoleLogger, type BehaviorLogger } from '../logger.js';
import { resolveHandler } from './resolve.js';

/**
 * Options for constructing a behavior.
 */
export type BehaviorOptions = {
  /** Name used in errors and logs (defaults to the class name) */
  name?: string;

  /** Logger for lifecycle events (defaults to consoleLogger) */
  logger?: BehaviorLogger;

  /** Attach configuration, validated on construction */
  config?: BehaviorConfigInput;
};

/**
 * Base class for behaviors.
 *
 * Subclasses override `events()` to declare handlers for the owner's events.
 * Subclasses that override `attach` or `detach` must call the base
 * implementation.
 *
 * Not safe for concurrent attach/detach on the same instance; callers
 * serialize lifecycle calls.
 *
 * @example
 * ```ts
 * class AuditTrail extends Behavior<SaveEvent> {
 *   events(): EventMap<SaveEvent> {
 *     return { beforeSave: 'onBeforeSave' };
 *   }
 *
 *   onBeforeSave(event: SaveEvent): void {
 *     // ...
 *   }
 * }
 *
 * const audit = new AuditTrail();
 * audit.attach(document);
 * // ...
 * audit.detach();
 * ```
 */
export class Behavior<
  TEvent = unknown,
  TOwner extends EventOwner<TEvent> = EventOwner<TEvent>,
> {
  readonly name: string;
  protected readonly logger: BehaviorLogger;
  protected readonly config: BehaviorConfig;

  private currentOwner: TOwner | undefined;
  private attachedHandlers: Registration<TEvent>[] = [];

  constructor(options: BehaviorOptions = {}) {
    this.name = options.name ?? this.constructor.name;
    this.logger = options.logger ?? consoleLogger;
    this.config = resolveBehaviorConfig(options.config);
  }

  /**
   * The owner this behavior is attached to, or undefined when detached.
   */
  get owner(): TOwner | undefined {
    return this.currentOwner;
  }

  get isAttached(): boolean {
    return this.currentOwner !== undefined;
  }

  /**
   * Snapshot of the handlers subscribed on the current owner, in
   * subscription order.
   */
  get registrations(): readonly Registration<TEvent>[] {
    return [...this.attachedHandlers];
  }

  /**
   * Declare handlers for the owner's events.
   * Called once per attach; the default declares none.
   */
  events(): EventMap<TEvent> {
    return {};
  }

  /**
   * Attach this behavior to an owner and subscribe its declared handlers.
   *
   * @throws AlreadyAttachedError if the behavior already has an owner
   * @throws UnresolvedHandlerError if a declaration cannot be resolved
   * @throws InvalidEventMapError if validateEvents is on and events() is malformed
   */
  attach(owner: TOwner): void {
    if (this.currentOwner !== undefined) {
      throw new AlreadyAttachedError(this.name);
    }

    this.currentOwner = owner;

    try {
      const declared = this.events();

      if (this.config.validateEvents) {
        const validation = validateEventMap(declared);
        if (!validation.valid) {
          throw new InvalidEventMapError(this.name, validation.errors);
        }
      }

      for (const [eventName, declaration] of eventMapEntries(declared)) {
        const handler = resolveHandler(this, eventName, declaration);
        owner.subscribe(eventName, handler);
        this.attachedHandlers.push({ eventName, handler });
      }
    } catch (error) {
      if (this.config.attachMode === 'atomic') {
        this.rollback(owner, error);
      }
      throw error;
    }

    this.logger.debug('Behavior attached', {
      behavior: this.name,
      events: this.attachedHandlers.map((r) => r.eventName),
    });
  }

  /**
   * Unsubscribe every recorded handler and clear the owner.
   * No-op when not attached.
   *
   * Every recorded pair is unsubscribed even if the owner throws for one of
   * them; the first owner error is rethrown after state is cleared.
   */
  detach(): void {
    const owner = this.currentOwner;
    if (owner === undefined) {
      return;
    }

    const registrations = this.attachedHandlers;
    const failures = unsubscribeAll(owner, registrations);

    this.attachedHandlers = [];
    this.currentOwner = undefined;

    this.logger.debug('Behavior detached', {
      behavior: this.name,
      events: registrations.map((r) => r.eventName),
    });

    if (failures.length > 0) {
      for (const failure of failures.slice(1)) {
        this.logger.warn('Additional unsubscribe failure during detach', {
          behavior: this.name,
          eventName: failure.eventName,
          error: errorMessage(failure.error),
        });
      }
      throw failures[0].error;
    }
  }

  private rollback(owner: TOwner, cause: unknown): void {
    const registrations = [...this.attachedHandlers].reverse();
    const failures = unsubscribeAll(owner, registrations);

    this.attachedHandlers = [];
    this.currentOwner = undefined;

    this.logger.warn('Behavior attach rolled back', {
      behavior: this.name,
      error: errorMessage(cause),
      unsubscribed: registrations.length,
    });

    for (const failure of failures) {
      this.logger.error('Unsubscribe failed during attach rollback', {
        behavior: this.name,
        eventName: failure.eventName,
        error: errorMessage(failure.error),
      });
    }
  }
}

type UnsubscribeFailure = {
  eventName: string;
  error: unknown;
};

function unsubscribeAll<TEvent>(
  owner: EventOwner<TEvent>,
  registrations: readonly Registration<TEvent>[]
): UnsubscribeFailure[] {
  const failures: UnsubscribeFailure[] = [];
  for (const { eventName, handler } of registrations) {
    try {
      owner.unsubscribe(eventName, handler);
    } catch (error) {
      failures.push({ eventName, error });
    }
  }
  return failures;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
