// @attachable/protocol
// Shared types and validation for owners and behaviors

export * from './types/index.js';

export {
  validateEventMap,
  type EventMapValidationResult,
  type EventMapValidationError,
  type EventMapValidationErrorCode,
} from './validation/events.js';
