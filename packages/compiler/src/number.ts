const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const HEXADECIMAL = /^([+-]?)0[xX]([0-9a-fA-F]*)(?:\.([0-9a-fA-F]*))?(?:[pP]([+-]?\d+))?$/

const hexDigits = (digits: string) => {
  let value = 0
  for (const digit of digits) {
    value = value * 16 + parseInt(digit, 16)
  }
  return value
}

/**
 * Convert a numeric literal, accepting decimal and hexadecimal forms
 * (`42`, `-1.5e3`, `.5`, `0x1F`, `0x1.8p1`).
 * @return the number, or undefined when the token is not a numeric literal
 */
export const toNumber = (token: string): number | undefined => {
  if (DECIMAL.test(token)) return Number(token)

  const match = HEXADECIMAL.exec(token)
  if (!match) return undefined
  const [, sign, whole, fraction = '', exponent] = match
  if (whole.length + fraction.length === 0) return undefined

  // fractional hex digits shift the mantissa by 4 bits each
  let value = hexDigits(whole + fraction) * Math.pow(2, -4 * fraction.length)
  if (exponent !== undefined) value *= Math.pow(2, Number(exponent))
  // Infinity * 0 from huge mantissas with huge negative exponents
  if (Number.isNaN(value)) return undefined
  return sign === '-' ? -value : value
}
