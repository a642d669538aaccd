/**
 * Custom Error Types for spatial-align
 */

export class SpatialAlignError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'SpatialAlignError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * An axis requested from a transformation or an element is not available
 */
export class AxisMismatchError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'AXIS_MISMATCH', details);
    this.name = 'AxisMismatchError';
  }
}

export class CoordinateSystemNotFoundError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'COORDINATE_SYSTEM_NOT_FOUND', details);
    this.name = 'CoordinateSystemNotFoundError';
  }
}

/**
 * The caller did not say unambiguously which transformation to apply
 */
export class AmbiguousTransformError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'AMBIGUOUS_TRANSFORM', details);
    this.name = 'AmbiguousTransformError';
  }
}

export class InvalidArgumentError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_ARGUMENT', details);
    this.name = 'InvalidArgumentError';
  }
}

export class NonInvertibleTransformError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'NON_INVERTIBLE', details);
    this.name = 'NonInvertibleTransformError';
  }
}

export class SchemaValidationError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'SCHEMA_VALIDATION', details);
    this.name = 'SchemaValidationError';
  }
}

/**
 * Internal precondition broken. Never caused by user input.
 */
export class InvariantViolationError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVARIANT_VIOLATION', details);
    this.name = 'InvariantViolationError';
  }
}

export class DocumentError extends SpatialAlignError {
  constructor(message: string, details?: unknown) {
    super(message, 'DOCUMENT_ERROR', details);
    this.name = 'DocumentError';
  }
}
