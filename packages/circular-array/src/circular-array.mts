/**
 * Fixed-capacity circular array
 *
 * Pushes never fail: once every slot has been written, each push overwrites
 * the oldest one. Slots can also be read and written directly by their
 * physical index, independent of push order.
 */

import type { BaseLogger } from '@ringslot/logger';

import { DegenerateCapacityError, OutOfBoundsError } from './errors.mjs';

export interface CircularArrayOptions {
  /**
   * Receives a debug record on construction and when the array first fills up.
   * Nothing is logged when omitted.
   */
  logger?: BaseLogger;
}

/**
 * A circular array of `N` slots that accepts an unbounded number of pushes
 */
export class CircularArray<T, N extends number = number> {
  private readonly slots: T[];
  private cursor = 0;
  private pushes = 0;
  private readonly capacity: N;
  private readonly logger?: BaseLogger;

  /**
   * @param capacity - number of slots, a positive integer
   * @param fill - value every slot holds until it is first written
   * @throws {DegenerateCapacityError} when capacity is not a positive integer
   */
  constructor(capacity: N, fill: T, options: CircularArrayOptions = {}) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new DegenerateCapacityError(capacity);
    }
    this.capacity = capacity;
    this.slots = new Array<T>(capacity).fill(fill);
    this.logger = options.logger;

    this.logger?.debug('circular array created', { capacity });
  }

  /**
   * Write an element into the slot under the cursor and advance the cursor
   * O(1) operation
   */
  push(item: T): void {
    this.slots[this.cursor] = item;
    this.cursor = (this.cursor + 1) % this.capacity;
    this.pushes++;

    if (this.pushes === this.capacity) {
      this.logger?.debug('circular array is full, further pushes overwrite the oldest slot', {
        capacity: this.capacity,
      });
    }
  }

  /**
   * Read a physical slot
   * @throws {OutOfBoundsError}
   */
  get(index: number): T {
    this.assertIndex(index);
    return this.slots[index];
  }

  /**
   * Overwrite a physical slot. The write cursor is left where it is.
   * @throws {OutOfBoundsError}
   */
  set(index: number, value: T): void {
    this.assertIndex(index);
    this.slots[index] = value;
  }

  /**
   * Get all slots as a new array, oldest first
   * O(n) operation
   *
   * Slots that were never pushed to come first, so the result always has
   * exactly `capacity` elements.
   */
  toArray(): T[] {
    const result: T[] = [];

    let index = this.cursor;
    for (let i = 0; i < this.capacity; i++) {
      result.push(this.slots[index]);
      index = (index + 1) % this.capacity;
    }

    return result;
  }

  /**
   * Get the value in the most recently pushed slot, or `undefined` before the first push
   */
  peekLast(): T | undefined {
    if (this.pushes === 0) {
      return undefined;
    }
    return this.slots[(this.cursor - 1 + this.capacity) % this.capacity];
  }

  /**
   * Total number of pushes since construction
   */
  get pushCount(): number {
    return this.pushes;
  }

  /**
   * Slot the next push writes to
   */
  get writeCursor(): number {
    return this.cursor;
  }

  /**
   * Check if every slot has been pushed to at least once
   */
  isFull(): boolean {
    return this.pushes >= this.capacity;
  }

  /**
   * Get the fixed capacity
   */
  getCapacity(): N {
    return this.capacity;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      throw new OutOfBoundsError(index, this.capacity);
    }
  }
}
