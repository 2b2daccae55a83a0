/**
 * String helpers shared by the validator and the field resolver.
 */

export function isBlank(text: string | null | undefined): boolean {
  return text === null || text === undefined || text.trim().length === 0
}

export function isNotBlank(text: string | null | undefined): text is string {
  return !isBlank(text)
}

// ============================================================================
// Message Formatting
// ============================================================================

//            %  [index$]      [flags]     [width]   [.precision]  conversion
const SPECIFIER = /%(?:(\d+)\$)?([-+ 0,#]*)(\d+)?(?:\.(\d+))?([sSdixXofbjn%])/g

interface Rendered {
  sign: string
  body: string
  numeric: boolean
}

function stringify(value: unknown): string {
  if (value === null) return 'null'
  if (value === undefined) return 'undefined'
  return String(value)
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
}

function signOf(negative: boolean, flags: string): string {
  if (negative) return '-'
  if (flags.includes('+')) return '+'
  if (flags.includes(' ')) return ' '
  return ''
}

function toInteger(value: unknown): bigint | null {
  if (typeof value === 'bigint') return value
  if (typeof value === 'number' && Number.isFinite(value)) return BigInt(Math.trunc(value))
  return null
}

function renderInteger(value: unknown, conversion: string, flags: string): Rendered | null {
  const n = toInteger(value)
  if (n === null) return null
  const negative = n < 0n
  const magnitude = negative ? -n : n

  let body: string
  if (conversion === 'x' || conversion === 'X') {
    body = magnitude.toString(16)
    if (flags.includes('#')) body = '0x' + body
    if (conversion === 'X') body = body.toUpperCase()
  } else if (conversion === 'o') {
    body = magnitude.toString(8)
    if (flags.includes('#')) body = '0' + body
  } else {
    body = magnitude.toString()
    if (flags.includes(',')) body = groupThousands(body)
  }
  return { sign: signOf(negative, flags), body, numeric: true }
}

function renderFloat(value: unknown, flags: string, precision: number | undefined): Rendered | null {
  const n = typeof value === 'bigint' ? Number(value) : value
  if (typeof n !== 'number' || !Number.isFinite(n)) return null

  const [whole = '', fraction] = Math.abs(n).toFixed(precision ?? 6).split('.')
  const grouped = flags.includes(',') ? groupThousands(whole) : whole
  const body = fraction === undefined ? grouped : `${grouped}.${fraction}`
  return { sign: signOf(n < 0, flags), body, numeric: true }
}

function renderText(value: unknown, conversion: string, precision: number | undefined): Rendered {
  let body: string
  if (conversion === 'j') body = JSON.stringify(value) ?? 'undefined'
  else if (conversion === 'b') body = String(value !== null && value !== undefined && value !== false)
  else body = stringify(value)

  if (precision !== undefined) body = body.slice(0, precision)
  if (conversion === 'S') body = body.toUpperCase()
  return { sign: '', body, numeric: false }
}

function render(value: unknown, conversion: string, flags: string, precision: number | undefined): Rendered {
  switch (conversion) {
    case 'd':
    case 'i':
    case 'x':
    case 'X':
    case 'o':
      return renderInteger(value, conversion, flags) ?? renderText(value, 's', undefined)
    case 'f':
      return renderFloat(value, flags, precision) ?? renderText(value, 's', undefined)
    default:
      return renderText(value, conversion, precision)
  }
}

function justify({ sign, body, numeric }: Rendered, flags: string, width: number): string {
  const gap = width - sign.length - body.length
  if (gap <= 0) return sign + body
  if (flags.includes('-')) return sign + body + ' '.repeat(gap)
  if (numeric && flags.includes('0')) return sign + '0'.repeat(gap) + body
  return ' '.repeat(gap) + sign + body
}

/**
 * Substitutes `values` into `template` printf-style.
 *
 * Specifiers take the form `%[index$][flags][width][.precision]conversion`.
 * Conversions: `s` / `S` text, `d` / `i` integer, `x` / `X` hex, `o` octal,
 * `f` fixed point (six decimals by default), `b` boolean, `j` JSON, `n`
 * newline and `%%` for a literal percent sign. Flags: `-` left-justify,
 * `0` zero-pad, `+` / space sign, `,` thousands grouping, `#` radix prefix.
 *
 * A specifier without a matching value is left as written; surplus values
 * are ignored. A value a numeric conversion cannot take is rendered as text.
 */
export function formatMessage(template: string, ...values: unknown[]): string {
  let next = 0
  return template.replace(
    SPECIFIER,
    (
      specifier: string,
      index: string | undefined,
      flags: string,
      width: string | undefined,
      precision: string | undefined,
      conversion: string
    ) => {
      if (conversion === '%') return '%'
      if (conversion === 'n') return '\n'

      const position = index === undefined ? next++ : parseInt(index, 10) - 1
      if (position < 0 || position >= values.length) return specifier

      const rendered = render(
        values[position],
        conversion,
        flags,
        precision === undefined ? undefined : parseInt(precision, 10)
      )
      return justify(rendered, flags, width === undefined ? 0 : parseInt(width, 10))
    }
  )
}
