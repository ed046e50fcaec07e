import { describe, it, expect } from 'vitest';

import { CircularArrayError, DegenerateCapacityError, OutOfBoundsError } from './errors.mjs';

describe('errors', () => {
  it('should describe an out of bounds index', () => {
    const error = new OutOfBoundsError(5, 3);

    expect(error).toBeInstanceOf(CircularArrayError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('OutOfBoundsError');
    expect(error.code).toBe('OUT_OF_BOUNDS');
    expect(error.message).toBe('Index 5 is out of bounds for capacity 3');
    expect(error.context).toEqual({ index: 5, capacity: 3 });
    expect(error.index).toBe(5);
    expect(error.capacity).toBe(3);
  });

  it('should describe a degenerate capacity', () => {
    const error = new DegenerateCapacityError(-2);

    expect(error).toBeInstanceOf(CircularArrayError);
    expect(error.name).toBe('DegenerateCapacityError');
    expect(error.code).toBe('DEGENERATE_CAPACITY');
    expect(error.message).toBe('Capacity must be a positive integer, got -2');
    expect(error.context).toEqual({ capacity: -2 });
  });

  it('should capture a stack trace', () => {
    const error = new CircularArrayError('boom', 'TEST');

    expect(error.stack).toContain('boom');
    expect(error.context).toBeUndefined();
  });
});
