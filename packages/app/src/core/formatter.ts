import { Match } from "effect"
import * as Either from "effect/Either"
import * as Option from "effect/Option"

import type { MalformedInput } from "./errors.js"
import { malformedInput } from "./errors.js"
import type { Lexeme, Scan } from "./grammar.js"
import {
  isAtEnd,
  peekLexeme,
  readBoolean,
  readNull,
  readNumber,
  readString,
  skipBom,
  skipWhitespace
} from "./grammar.js"

// CHANGE: pretty-print raw JSON text without building a value tree
// WHY: reformatting must keep number and string lexemes exactly as written
// FORMAT THEOREM: ∀t: format(t) = Right(u) → scalar tokens of u = scalar tokens of t (byte-equal)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: text outside the top-level value passes through unchanged
// COMPLEXITY: O(n)

export interface FormatterOptions {
  readonly alignBase: number
  readonly indentWidth: number
  readonly itemSeparator: string
  readonly keySeparator: string
  readonly lineEnding: string
  readonly maxDepth: number
}

export interface Formatter {
  readonly options: FormatterOptions
  readonly format: (text: string) => Either.Either<string, MalformedInput>
}

export const defaultFormatterOptions: FormatterOptions = {
  alignBase: 0,
  indentWidth: 4,
  itemSeparator: ",\r\n",
  keySeparator: ": ",
  lineEnding: "\r\n",
  maxDepth: 512
}

interface Context {
  readonly text: string
  readonly options: FormatterOptions
}

const pad = (width: number): string => " ".repeat(width)

const verbatim = <A>(ctx: Context, pos: number, lead: string, scanned: Scan<A>): Scan<string> =>
  Either.map(scanned, ({ end }) => ({ value: lead + ctx.text.slice(pos, end), end }))

const tooDeep = (): MalformedInput => malformedInput("Nesting too deep")

const formatArray = (ctx: Context, pos: number, align: number, lead: string, depth: number): Scan<string> => {
  if (depth >= ctx.options.maxDepth) {
    return Either.left(tooDeep())
  }
  const { text, options } = ctx
  let end = skipWhitespace(text, pos + 1)
  if (text.charAt(end) === "]") {
    return Either.right({ value: `${lead}[]`, end: end + 1 })
  }
  const inner = align + options.indentWidth
  let out = `${lead}[${options.lineEnding}`
  while (end < text.length) {
    const item = formatValue(ctx, end, inner, true, depth + 1)
    if (Either.isLeft(item)) {
      return item
    }
    out += item.right.value
    end = skipWhitespace(text, item.right.end)
    const char = text.charAt(end)
    if (char === "]") {
      return Either.right({ value: `${out}${options.lineEnding}${pad(align)}]`, end: end + 1 })
    }
    if (char !== ",") {
      break
    }
    out += options.itemSeparator
    end += 1
  }
  return Either.left(malformedInput("Error in formatting json \"array\" string"))
}

const formatObject = (ctx: Context, pos: number, align: number, lead: string, depth: number): Scan<string> => {
  if (depth >= ctx.options.maxDepth) {
    return Either.left(tooDeep())
  }
  const { text, options } = ctx
  let end = skipWhitespace(text, pos + 1)
  if (text.charAt(end) === "}") {
    return Either.right({ value: `${lead}{}`, end: end + 1 })
  }
  const inner = align + options.indentWidth
  let out = `${lead}{${options.lineEnding}`
  while (end < text.length) {
    const keyStart = skipWhitespace(text, end)
    const key = readString(text, keyStart)
    if (Either.isLeft(key)) {
      return Either.left(key.left)
    }
    end = skipWhitespace(text, key.right.end)
    if (text.charAt(end) !== ":") {
      break
    }
    const member = formatValue(ctx, end + 1, inner, false, depth + 1)
    if (Either.isLeft(member)) {
      return member
    }
    out += `${pad(inner)}${text.slice(keyStart, key.right.end)}${options.keySeparator}${member.right.value}`
    end = skipWhitespace(text, member.right.end)
    const char = text.charAt(end)
    if (char === "}") {
      return Either.right({ value: `${out}${options.lineEnding}${pad(align)}}`, end: end + 1 })
    }
    if (char !== ",") {
      break
    }
    out += options.itemSeparator
    end += 1
  }
  return Either.left(malformedInput("Error in formatting json \"object\" string"))
}

const formatLexeme = (
  ctx: Context,
  lexeme: Lexeme,
  pos: number,
  align: number,
  lead: string,
  depth: number
): Scan<string> =>
  Match.value(lexeme).pipe(
    Match.when("null", () => verbatim(ctx, pos, lead, readNull(ctx.text, pos))),
    Match.when("boolean", () => verbatim(ctx, pos, lead, readBoolean(ctx.text, pos))),
    Match.when("number", () => verbatim(ctx, pos, lead, readNumber(ctx.text, pos))),
    Match.when("string", () => verbatim(ctx, pos, lead, readString(ctx.text, pos))),
    Match.when("array", () => formatArray(ctx, pos, align, lead, depth)),
    Match.when("object", () => formatObject(ctx, pos, align, lead, depth)),
    Match.exhaustive
  )

// `indented` is false for object members, which continue the key's line.
const formatValue = (ctx: Context, pos: number, align: number, indented: boolean, depth: number): Scan<string> => {
  const start = skipWhitespace(ctx.text, pos)
  const lexeme = peekLexeme(ctx.text, start)
  if (Option.isNone(lexeme)) {
    return Either.left(malformedInput("Wrong JSON string"))
  }
  return formatLexeme(ctx, lexeme.value, start, align, indented ? pad(align) : "", depth)
}

/**
 * Build a formatter with fixed layout options.
 *
 * @param overrides - Options that replace the CRLF / 4-space defaults.
 * @returns Formatter whose format is pure and reentrant.
 *
 * @pure true
 * @invariant empty containers render as "[]" and "{}"
 * @complexity O(n)
 */
export const makeFormatter = (overrides: Partial<FormatterOptions> = {}): Formatter => {
  const options: FormatterOptions = { ...defaultFormatterOptions, ...overrides }
  return {
    options,
    format: (text) => {
      if (text.length === 0) {
        return Either.left(malformedInput("Empty JSON text"))
      }
      const start = skipWhitespace(text, skipBom(text))
      const body = formatValue({ text, options }, start, options.alignBase, true, 0)
      if (Either.isLeft(body)) {
        return Either.left(body.left)
      }
      if (!isAtEnd(text, body.right.end)) {
        return Either.left(malformedInput("Incorrect end of json string"))
      }
      return Either.right(text.slice(0, start) + body.right.value + text.slice(body.right.end))
    }
  }
}
