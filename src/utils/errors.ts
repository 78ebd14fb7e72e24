// Utilities: Custom error types
// Gameplay rejections are outcomes, not errors; these cover the rest

export class GameEngineError extends Error {
  statusCode = 400;
  code = 'GAME_ENGINE_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'GameEngineError';
    this.details = details;
  }
}

/**
 * A conversation operation was called in a state that does not allow it
 * (answering before start or after completion).
 */
export class InvalidStateError extends GameEngineError {
  code = 'INVALID_STATE';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'InvalidStateError';
  }
}

/**
 * Fewer eligible questions than requested. `available` tells the caller how
 * many it can ask instead.
 */
export class InsufficientContentError extends GameEngineError {
  code = 'INSUFFICIENT_CONTENT';
  readonly available: number;
  readonly requested: number;

  constructor(message: string, requested: number, available: number) {
    super(message, { requested, available });
    this.name = 'InsufficientContentError';
    this.requested = requested;
    this.available = available;
  }
}

export class ContentLoadError extends Error {
  statusCode = 500;
  code = 'CONTENT_LOAD_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ContentLoadError';
    this.details = details;
  }
}

export class SaveLoadError extends Error {
  statusCode = 422;
  code = 'SAVE_LOAD_ERROR';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SaveLoadError';
    this.details = details;
  }
}

export class IncompatibleSaveError extends SaveLoadError {
  statusCode = 409;
  code = 'INCOMPATIBLE_SAVE';

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'IncompatibleSaveError';
  }
}

export class SessionNotFoundError extends Error {
  statusCode = 404;
  code = 'SESSION_NOT_FOUND';
  details?: Record<string, unknown>;

  constructor(sessionId: string) {
    super(`Session ${sessionId} not found`);
    this.name = 'SessionNotFoundError';
    this.details = { sessionId };
  }
}

export class SaveSlotNotFoundError extends Error {
  statusCode = 404;
  code = 'SAVE_SLOT_NOT_FOUND';
  details?: Record<string, unknown>;

  constructor(sessionId: string, slotName: string) {
    super(`Save slot "${slotName}" not found`);
    this.name = 'SaveSlotNotFoundError';
    this.details = { sessionId, slotName };
  }
}

// Core bug, never a player condition
export class InvariantViolationError extends Error {
  statusCode = 500;
  code = 'INVARIANT_VIOLATION';
  details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'InvariantViolationError';
    this.details = details;
  }
}

export function invariant(condition: unknown, message: string, details?: Record<string, unknown>): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message, details);
  }
}
