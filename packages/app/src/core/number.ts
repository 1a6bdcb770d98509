import * as Option from "effect/Option"

// CHANGE: render floats in the shortest repr form and classify number tokens
// WHY: a float must read back as the same double it was written from
// FORMAT THEOREM: ∀x finite: Number(formatFloat(x)) = x ∧ formatFloat(x) contains "." or "e"
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: fixed notation for exponents in [-4, 16), scientific otherwise
// COMPLEXITY: O(d) where d = significant digits

const FIXED_MIN_EXPONENT = -4
const FIXED_MAX_EXPONENT = 16

const splitScientific = (magnitude: number): { readonly digits: string; readonly exponent: number } => {
  const [mantissa = "0", exponent = "0"] = magnitude.toExponential().split("e")
  return { digits: mantissa.replace(".", ""), exponent: Number(exponent) }
}

const fixedNotation = (digits: string, exponent: number): string => {
  if (exponent < 0) {
    return `0.${"0".repeat(-exponent - 1)}${digits}`
  }
  const whole = digits.length > exponent + 1 ? digits.slice(0, exponent + 1) : digits.padEnd(exponent + 1, "0")
  const fraction = digits.slice(exponent + 1)
  return `${whole}.${fraction.length > 0 ? fraction : "0"}`
}

const scientificNotation = (digits: string, exponent: number): string => {
  const head = digits.slice(0, 1)
  const tail = digits.slice(1)
  const sign = exponent < 0 ? "-" : "+"
  const magnitude = String(Math.abs(exponent)).padStart(2, "0")
  return `${head}${tail.length > 0 ? `.${tail}` : ""}e${sign}${magnitude}`
}

/**
 * Render a float so that it reads back as the same float and never as an integer.
 *
 * @param value - Float to render.
 * @returns Some(text), or None for NaN and infinities which JSON cannot carry.
 *
 * @pure true
 * @invariant -0 renders as "-0.0"
 * @complexity O(d)
 */
export const formatFloat = (value: number): Option.Option<string> => {
  if (!Number.isFinite(value)) {
    return Option.none()
  }
  const sign = value < 0 || Object.is(value, -0) ? "-" : ""
  const { digits, exponent } = splitScientific(Math.abs(value))
  const body = exponent >= FIXED_MIN_EXPONENT && exponent < FIXED_MAX_EXPONENT
    ? fixedNotation(digits, exponent)
    : scientificNotation(digits, exponent)
  return Option.some(sign + body)
}

export const toFloat = (value: bigint | number): number => typeof value === "bigint" ? Number(value) : value
