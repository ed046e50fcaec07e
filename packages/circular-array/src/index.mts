/**
 * Fixed-capacity circular array with unbounded pushes and direct slot access
 *
 * @packageDocumentation
 */

export { CircularArray } from './circular-array.mjs';
export type { CircularArrayOptions } from './circular-array.mjs';
export { CircularArrayError, DegenerateCapacityError, OutOfBoundsError } from './errors.mjs';
