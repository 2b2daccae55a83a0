/**
 * lang-kit
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  LangKitError, LangKitErrorCode,
  FormatError, InvalidArgumentError, AmbiguousMemberError,
} from './errors'
export type { LangKitErrorCode as LangKitErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Strings & argument validation
export { isBlank, isNotBlank, formatMessage } from './strings'
export { isTrue, notNull, notBlank } from './validate'

// Date & date-time conversion
export type { LocalDate, LocalDateTime, Binder } from './date-time'
export {
  DATE_PATTERN, DATE_TIME_PATTERN,
  isLeapYear, daysInMonth,
  parseDate, parseDateTime, tryParseDate, tryParseDateTime,
  formatDate, formatDateTime,
  makeDate, makeDateTime,
  yearOf, monthOf, dayOf, hourOf, minuteOf, secondOf, dateOf,
  fromJsDate, fromJsDateTime, toJsDate,
  dateBinder, dateTimeBinder,
} from './date-time'

// Type model
export type {
  Visibility, TypeKind,
  TypeDescriptor, FieldDescriptor, FieldAccessor,
  ClassSpec, InterfaceSpec, FieldSpec,
} from './type-descriptor'
export { defineClass, defineInterface, isInterface, describeType } from './type-descriptor'

// Hierarchy inspection
export { getAllInterfaces, getAllSuperclasses, isAssignable } from './class-hierarchy'

// Field resolution
export type { FieldLookup } from './field-resolver'
export {
  lookupField, getField, resolveField, getDeclaredField, getAllFields,
  readField, writeField,
} from './field-resolver'
