/**
 * Argument validation
 *
 * Each check throws an InvalidArgumentError when it fails. Messages are
 * format templates: the values are substituted only when the check fails.
 *
 *   isTrue(i > 0, 'The value must be greater than zero: %d', i)
 *   isTrue(i >= min && i <= max, 'The value must be between %d and %d', min, max)
 */

import { InvalidArgumentError } from './errors'
import { formatMessage, isBlank } from './strings'

export { InvalidArgumentError } from './errors'

export function isTrue(
  expression: boolean,
  message: string,
  ...values: unknown[]
): asserts expression {
  if (!expression) {
    throw new InvalidArgumentError(formatMessage(message, ...values))
  }
}

/** Returns `value` when it is neither null nor undefined */
export function notNull<T>(
  value: T | null | undefined,
  message: string,
  ...values: unknown[]
): T {
  if (value === null || value === undefined) {
    throw new InvalidArgumentError(formatMessage(message, ...values))
  }
  return value
}

/** Returns `text` when it holds at least one non-whitespace character */
export function notBlank(
  text: string | null | undefined,
  message: string,
  ...values: unknown[]
): string {
  if (text === null || text === undefined || isBlank(text)) {
    throw new InvalidArgumentError(formatMessage(message, ...values))
  }
  return text
}
