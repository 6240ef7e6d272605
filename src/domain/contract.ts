import { InvariantViolationError } from './errors';

export function throwIfNull<T>(value: T | null | undefined, message: string): asserts value is T {
  if (value === null || value === undefined) {
    throw new InvariantViolationError(message);
  }
}
