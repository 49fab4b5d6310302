// @attachable/runtime
// Attach behaviors to event-capable owners and detach them without leaks

// Behaviors
export {
  Behavior,
  BehaviorSet,
  resolveHandler,
  type BehaviorOptions,
  type BehaviorSetOptions,
} from './behaviors/index.js';

// Configuration
export {
  behaviorConfigSchema,
  defaultBehaviorConfig,
  resolveBehaviorConfig,
  type BehaviorConfigInput,
} from './config.js';

// Logging
export {
  consoleLogger,
  silentLogger,
  createCapturingLogger,
  type BehaviorLogger,
  type LogEntry,
} from './logger.js';

// Error types
export {
  RuntimeError,
  ValidationError,
  AlreadyAttachedError,
  UnresolvedHandlerError,
  InvalidEventMapError,
  InvalidBehaviorConfigError,
  type ConfigIssue,
} from './errors.js';
