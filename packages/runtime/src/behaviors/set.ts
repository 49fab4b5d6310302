// BehaviorSet - named behaviors attached to one owner

import type { EventOwner } from '@attachable/protocol';
import { AlreadyAttachedError } from '../errors.js';
import { consoleLogger, type BehaviorLogger } from '../logger.js';
import type { Behavior } from './behavior.js';

export type BehaviorSetOptions = {
  logger?: BehaviorLogger;
};

/**
 * Tracks behaviors attached to a single owner under unique names.
 *
 * Attaching under a name that is already taken detaches the previous
 * behavior first. Each behavior keeps its own registrations, so detaching
 * one never touches another's handlers.
 */
export class BehaviorSet<
  TEvent = unknown,
  TOwner extends EventOwner<TEvent> = EventOwner<TEvent>,
> {
  readonly owner: TOwner;
  private readonly logger: BehaviorLogger;
  private readonly behaviors = new Map<string, Behavior<TEvent, TOwner>>();

  constructor(owner: TOwner, options: BehaviorSetOptions = {}) {
    this.owner = owner;
    this.logger = options.logger ?? consoleLogger;
  }

  /**
   * Attach a behavior under a name.
   * If attaching fails, nothing is stored under the name and nothing the
   * behavior subscribed is left on the owner.
   *
   * @throws AlreadyAttachedError if the behavior already has an owner;
   *   the behavior stored under the name is left untouched
   * @returns The attached behavior
   */
  attach<B extends Behavior<TEvent, TOwner>>(name: string, behavior: B): B {
    if (behavior.isAttached) {
      throw new AlreadyAttachedError(behavior.name);
    }

    if (this.behaviors.has(name)) {
      this.logger.info('Replacing behavior', { name });
      this.detach(name);
    }

    try {
      behavior.attach(this.owner);
    } catch (error) {
      if (behavior.isAttached) {
        this.discardPartial(name, behavior);
      }
      throw error;
    }

    this.behaviors.set(name, behavior);
    return behavior;
  }

  /**
   * Detach and forget the behavior stored under a name.
   *
   * @returns The detached behavior, or undefined if none was stored
   */
  detach(name: string): Behavior<TEvent, TOwner> | undefined {
    const behavior = this.behaviors.get(name);
    if (!behavior) {
      return undefined;
    }

    this.behaviors.delete(name);
    behavior.detach();
    return behavior;
  }

  /**
   * Detach every behavior, most recently attached first.
   *
   * Keeps going when a behavior's owner throws; the first error is rethrown
   * once every behavior has been detached.
   */
  detachAll(): void {
    const failures: Array<{ name: string; error: unknown }> = [];

    for (const name of this.names().reverse()) {
      try {
        this.detach(name);
      } catch (error) {
        failures.push({ name, error });
      }
    }

    if (failures.length > 0) {
      for (const failure of failures.slice(1)) {
        this.logger.warn('Additional detach failure', {
          name: failure.name,
          error: errorMessage(failure.error),
        });
      }
      throw failures[0].error;
    }
  }

  get(name: string): Behavior<TEvent, TOwner> | undefined {
    return this.behaviors.get(name);
  }

  has(name: string): boolean {
    return this.behaviors.has(name);
  }

  /**
   * Names in attach order.
   */
  names(): string[] {
    return Array.from(this.behaviors.keys());
  }

  get size(): number {
    return this.behaviors.size;
  }

  private discardPartial(name: string, behavior: Behavior<TEvent, TOwner>): void {
    try {
      behavior.detach();
    } catch (error) {
      this.logger.error('Detach failed after partial attach', {
        name,
        error: errorMessage(error),
      });
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
