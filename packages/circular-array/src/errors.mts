/**
 * Error classes thrown by the circular array
 */

/**
 * Base error class for all circular array errors
 */
export class CircularArrayError extends Error {
  constructor(message: string, public readonly code: string, public readonly context?: unknown) {
    super(message);
    this.name = 'CircularArrayError';

    // maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a slot index falls outside [0, capacity)
 */
export class OutOfBoundsError extends CircularArrayError {
  constructor(
    public readonly index: number,
    public readonly capacity: number
  ) {
    super(
      `Index ${index} is out of bounds for capacity ${capacity}`,
      'OUT_OF_BOUNDS',
      { index, capacity }
    );
    this.name = 'OutOfBoundsError';
  }
}

/**
 * Error thrown when a circular array is created without a positive integer capacity
 */
export class DegenerateCapacityError extends CircularArrayError {
  constructor(public readonly capacity: number) {
    super(
      `Capacity must be a positive integer, got ${capacity}`,
      'DEGENERATE_CAPACITY',
      { capacity }
    );
    this.name = 'DegenerateCapacityError';
  }
}
