/**
 * Text encoders used to assemble metadata documents.
 * Output is matched byte-for-byte by fixtures.
 */

const HEX_ALPHABET = '0123456789abcdef'

/**
 * Encode a 24-bit value as six lowercase hex digits, most significant
 * nibble first, without a leading '#'.
 *
 * @throws RangeError if the value is not an integer in [0, 0xffffff]
 */
export function toHexColor(value: number): string {
  if (!Number.isInteger(value) || value < 0 || value > 0xffffff) {
    throw new RangeError(`Color must be a 24-bit unsigned integer, got ${value}`)
  }
  let out = ''
  for (let shift = 20; shift >= 0; shift -= 4) {
    out += HEX_ALPHABET[(value >> shift) & 0xf]
  }
  return out
}

/**
 * Encode a non-negative integer in base 10 with no leading zeros.
 *
 * @throws RangeError for negative or non-integer input
 */
export function toDecimalString(value: number | bigint): string {
  let remaining: bigint
  if (typeof value === 'bigint') {
    remaining = value
  } else {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`Expected a safe integer, got ${value}`)
    }
    remaining = BigInt(value)
  }
  if (remaining < 0n) {
    throw new RangeError(`Expected a non-negative integer, got ${value}`)
  }
  if (remaining === 0n) return '0'

  const digits: string[] = []
  while (remaining > 0n) {
    digits.push(HEX_ALPHABET[Number(remaining % 10n)])
    remaining /= 10n
  }
  return digits.reverse().join('')
}

/**
 * Minimal JSON string escaper: only '"' and '\' are escaped.
 * Control characters pass through untouched, so the input must come from
 * trusted, generated text.
 */
export function escapeJson(text: string): string {
  let out = ''
  for (const ch of text) {
    if (ch === '"') {
      out += '\\"'
    } else if (ch === '\\') {
      out += '\\\\'
    } else {
      out += ch
    }
  }
  return out
}
