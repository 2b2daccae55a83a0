/**
 * Date & Date-Time Conversion
 *
 * Strict conversion between calendar values and their fixed-pattern text:
 *   date       yyyy-MM-dd
 *   date-time  yyyy-MM-dd'T'HH:mm:ss
 *
 * Values are branded strings, so a LocalDate or LocalDateTime in hand has
 * already been validated. Absent values format to null, which is what a
 * marshalling layer expects for an omitted element.
 */

import { type Result, Ok, Err, unwrap } from './result'
import { isTrue } from './validate'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localDateTime: unique symbol

/** Calendar date: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** Calendar date-time at second precision: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

export const DATE_PATTERN = 'yyyy-MM-dd'
export const DATE_TIME_PATTERN = "yyyy-MM-dd'T'HH:mm:ss"

// ============================================================================
// Errors
// ============================================================================

export { FormatError } from './errors'
import { FormatError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  isTrue(Number.isInteger(month) && month >= 1 && month <= 12, 'Invalid month: %d', month)
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function isValidDate(year: number, month: number, day: number): boolean {
  return (
    year >= 1 && year <= 9999 &&
    month >= 1 && month <= 12 &&
    day >= 1 && day <= daysInMonth(year, month)
  )
}

function isValidTime(hour: number, minute: number, second: number): boolean {
  return hour <= 23 && minute <= 59 && second <= 59
}

function isWholeNumber(...values: number[]): boolean {
  return values.every((v) => Number.isInteger(v) && v >= 0)
}

// ============================================================================
// Parsing
// ============================================================================

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/
const DATE_TIME_RE = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2}):(\d{2})$/

export function tryParseDate(text: string): Result<LocalDate, FormatError> {
  const match = DATE_RE.exec(text)
  if (!match) {
    return Err(new FormatError(`Invalid date format (expected ${DATE_PATTERN}): '${text}'`))
  }

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (year < 1)
    return Err(new FormatError(`Invalid year in date: '${text}'`))
  if (month < 1 || month > 12)
    return Err(new FormatError(`Invalid month in date: '${text}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new FormatError(`Invalid day in date: '${text}'`))

  return Ok(text as LocalDate)
}

export function tryParseDateTime(text: string): Result<LocalDateTime, FormatError> {
  const match = DATE_TIME_RE.exec(text)
  if (!match) {
    return Err(
      new FormatError(`Invalid datetime format (expected ${DATE_TIME_PATTERN}): '${text}'`)
    )
  }

  if (!tryParseDate(match[1] ?? '').ok)
    return Err(new FormatError(`Invalid date in datetime: '${text}'`))

  const hour = parseInt(match[2] ?? '', 10)
  const minute = parseInt(match[3] ?? '', 10)
  const second = parseInt(match[4] ?? '', 10)

  if (hour > 23)
    return Err(new FormatError(`Invalid hour in datetime: '${text}'`))
  if (minute > 59)
    return Err(new FormatError(`Invalid minute in datetime: '${text}'`))
  if (second > 59)
    return Err(new FormatError(`Invalid second in datetime: '${text}'`))

  return Ok(text as LocalDateTime)
}

/** @throws FormatError */
export function parseDate(text: string): LocalDate {
  return unwrap(tryParseDate(text))
}

/** @throws FormatError */
export function parseDateTime(text: string): LocalDateTime {
  return unwrap(tryParseDateTime(text))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  isTrue(
    isWholeNumber(year, month, day) && isValidDate(year, month, day),
    'Invalid date components: year=%d, month=%d, day=%d',
    year, month, day
  )
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeDateTime(
  date: LocalDate,
  hour: number,
  minute: number,
  second?: number
): LocalDateTime {
  const s = second ?? 0
  isTrue(
    isWholeNumber(hour, minute, s) && isValidTime(hour, minute, s),
    'Invalid time components: hour=%d, minute=%d, second=%d',
    hour, minute, s
  )
  return `${date}T${pad2(hour)}:${pad2(minute)}:${pad2(s)}` as LocalDateTime
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate | LocalDateTime): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate | LocalDateTime): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate | LocalDateTime): number {
  return parseInt(date.substring(8, 10), 10)
}

export function hourOf(dt: LocalDateTime): number {
  return parseInt(dt.substring(11, 13), 10)
}

export function minuteOf(dt: LocalDateTime): number {
  return parseInt(dt.substring(14, 16), 10)
}

export function secondOf(dt: LocalDateTime): number {
  return parseInt(dt.substring(17, 19), 10)
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

// ============================================================================
// Formatting
// ============================================================================

export function formatDate(date: LocalDate | null | undefined): string | null {
  if (date === null || date === undefined) return null
  return `${pad4(yearOf(date))}-${pad2(monthOf(date))}-${pad2(dayOf(date))}`
}

export function formatDateTime(dt: LocalDateTime | null | undefined): string | null {
  if (dt === null || dt === undefined) return null
  const time = `${pad2(hourOf(dt))}:${pad2(minuteOf(dt))}:${pad2(secondOf(dt))}`
  return `${formatDate(dateOf(dt))}T${time}`
}

// ============================================================================
// JavaScript Date Interop (UTC)
// ============================================================================

function isDateTime(value: LocalDate | LocalDateTime): value is LocalDateTime {
  return value.length > 10
}

export function fromJsDate(date: Date): LocalDate {
  isTrue(!isNaN(date.getTime()), 'The date must be a valid Date')
  return makeDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate())
}

/** Milliseconds are truncated */
export function fromJsDateTime(date: Date): LocalDateTime {
  return makeDateTime(
    fromJsDate(date),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds()
  )
}

export function toJsDate(value: LocalDate | LocalDateTime): Date {
  const result = new Date(0)
  // setUTCFullYear keeps years below 100 literal; Date.UTC would map them to 19xx
  result.setUTCFullYear(yearOf(value), monthOf(value) - 1, dayOf(value))
  if (isDateTime(value)) {
    result.setUTCHours(hourOf(value), minuteOf(value), secondOf(value), 0)
  }
  return result
}

// ============================================================================
// Marshalling Binders
// ============================================================================

/** Adapter between a value type and its text form in a marshalled document */
export interface Binder<T> {
  parse(text: string): T
  print(value: T | null | undefined): string | null
}

export const dateBinder: Binder<LocalDate> = {
  parse: parseDate,
  print: formatDate,
}

export const dateTimeBinder: Binder<LocalDateTime> = {
  parse: parseDateTime,
  print: formatDateTime,
}
