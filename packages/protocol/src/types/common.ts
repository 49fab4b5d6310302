// Common types shared by owners and behaviors

/**
 * Name of an event fired by an owner (e.g. 'beforeSave').
 */
export type EventName = string;

/**
 * A callable subscribed to an owner's event.
 * The owner passes whatever event object it fires; the return value is ignored.
 */
export type Handler<TEvent = unknown> = (event: TEvent) => void;
