// Behavior configuration types

/**
 * How `attach` handles a failure part-way through registration.
 *
 * - atomic: roll back earlier registrations and leave the behavior detached
 * - partial: keep earlier registrations and leave the behavior attached
 */
export type AttachMode = 'atomic' | 'partial';

export type BehaviorConfig = {
  /** Failure handling during attach (default: 'atomic') */
  attachMode: AttachMode;

  /** Validate the declared event map before registering anything (default: false) */
  validateEvents: boolean;
};
