import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { MalformedInput } from "./errors.js"
import { malformedInput } from "./errors.js"

// CHANGE: share JSON token recognition between the decoder and the formatter
// WHY: the decoder and the formatter must agree on what a token is
// FORMAT THEOREM: ∀t,p: read(t, p) = Right({ end }) → end > p ∧ t[p, end) is one lexeme
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: the cursor only moves forward; patterns are anchored at the cursor
// COMPLEXITY: O(n) per lexeme where n = lexeme length

export interface Token<A> {
  readonly value: A
  readonly end: number
}

export type Scan<A> = Either.Either<Token<A>, MalformedInput>

export type Lexeme = "null" | "boolean" | "number" | "string" | "array" | "object"

export interface NumberToken {
  readonly raw: string
  readonly integral: boolean
}

const WHITESPACE = /[ \t\n\r]*/y
const NULL = /null/y
const BOOLEAN = /true|false/y
const NUMBER = /-?(?:0|[1-9]\d*)(\.\d+)?([eE][-+]?\d+)?/y
const STRING_STOP = /["\\]/g
const HEX4 = /^[0-9a-fA-F]{4}$/u
const BOM = "\uFEFF"

const ESCAPES: Readonly<Record<string, string>> = {
  "\"": "\"",
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t"
}

const matchAt = (pattern: RegExp, text: string, pos: number): RegExpExecArray | null => {
  pattern.lastIndex = pos
  return pattern.exec(text)
}

export const skipWhitespace = (text: string, pos: number): number => {
  const match = matchAt(WHITESPACE, text, pos)
  return match === null ? pos : pos + match[0].length
}

export const skipBom = (text: string): number => text.startsWith(BOM) ? BOM.length : 0

export const isAtEnd = (text: string, pos: number): boolean => skipWhitespace(text, pos) === text.length

/**
 * Classify the lexeme that starts at the cursor from its first character.
 *
 * @pure true
 * @complexity O(1)
 */
export const peekLexeme = (text: string, pos: number): Option.Option<Lexeme> => {
  const char = text.charAt(pos)
  if (char === "n") {
    return Option.some("null")
  }
  if (char === "t" || char === "f") {
    return Option.some("boolean")
  }
  if (char.length === 1 && "-0123456789".includes(char)) {
    return Option.some("number")
  }
  if (char === "\"") {
    return Option.some("string")
  }
  if (char === "[") {
    return Option.some("array")
  }
  if (char === "{") {
    return Option.some("object")
  }
  return Option.none()
}

export const readNull = (text: string, pos: number): Scan<null> => {
  const match = matchAt(NULL, text, pos)
  return match === null
    ? Either.left(malformedInput("Error in parsing json \"null\" string"))
    : Either.right({ value: null, end: pos + match[0].length })
}

export const readBoolean = (text: string, pos: number): Scan<boolean> => {
  const match = matchAt(BOOLEAN, text, pos)
  return match === null
    ? Either.left(malformedInput("Error in parsing json \"boolean\" string"))
    : Either.right({ value: match[0] === "true", end: pos + match[0].length })
}

export const readNumber = (text: string, pos: number): Scan<NumberToken> => {
  const match = matchAt(NUMBER, text, pos)
  if (match === null) {
    return Either.left(malformedInput("Error in parsing json \"number\" string"))
  }
  const [raw, fraction, exponent] = match
  return Either.right({
    value: { raw, integral: fraction === undefined && exponent === undefined },
    end: pos + raw.length
  })
}

const readUnicodeEscape = (text: string, pos: number): Option.Option<string> => {
  const hex = text.slice(pos, pos + 4)
  return HEX4.test(hex) ? Option.some(String.fromCharCode(Number.parseInt(hex, 16))) : Option.none()
}

const stringError = (): MalformedInput => malformedInput("Error in parsing json \"string\" string")

/**
 * Read a quoted string starting at the opening quote and unescape it.
 *
 * Each `\uXXXX` contributes one UTF-16 code unit, so a surrogate pair written as two
 * escapes yields the combined character while a lone surrogate stays as it is.
 *
 * @param text - Source text.
 * @param pos - Cursor on the opening quote.
 * @returns Unescaped content and the cursor after the closing quote.
 *
 * @pure true
 * @invariant raw text between pos and end is exactly one string lexeme
 * @complexity O(n)
 */
export const readString = (text: string, pos: number): Scan<string> => {
  if (text.charAt(pos) !== "\"") {
    return Either.left(stringError())
  }
  let content = ""
  let end = pos + 1
  while (end <= text.length) {
    const stop = matchAt(STRING_STOP, text, end)
    if (stop === null) {
      return Either.left(stringError())
    }
    content += text.slice(end, stop.index)
    end = stop.index + 1
    if (stop[0] === "\"") {
      return Either.right({ value: content, end })
    }
    const escape = text.charAt(end)
    if (escape === "u") {
      const unit = readUnicodeEscape(text, end + 1)
      if (Option.isNone(unit)) {
        return Either.left(stringError())
      }
      content += unit.value
      end += 5
    } else {
      const replacement = ESCAPES[escape]
      if (replacement === undefined) {
        return Either.left(stringError())
      }
      content += replacement
      end += 1
    }
  }
  return Either.left(stringError())
}
