import type { CliArgs, LineEnding } from "./cli.js"
import type { FormatterOptions } from "./formatter.js"
import { defaultFormatterOptions } from "./formatter.js"
import type { Tier } from "./json.js"

// CHANGE: define config merging rules and defaults
// WHY: CLI flags override the config file, which overrides the defaults
// FORMAT THEOREM: ∀k: resolve(cli, cfg).k = cli.k ?? cfg.k ?? default(k)
// PURITY: CORE
// EFFECT: n/a
// INVARIANT: resolved maxDepth ≥ 1
// COMPLEXITY: O(1)/O(1)

export interface FileConfig {
  readonly tier?: Tier
  readonly indent?: number
  readonly align?: number
  readonly eol?: LineEnding
  readonly encoding?: string
  readonly maxDepth?: number
}

export interface ResolvedConfig {
  readonly tier: Tier
  readonly indent: number | undefined
  readonly align: number
  readonly eol: LineEnding
  readonly encoding: string
  readonly maxDepth: number
}

export const defaultConfig: ResolvedConfig = {
  tier: "custom",
  indent: undefined,
  align: 0,
  eol: "crlf",
  encoding: "utf-8",
  maxDepth: defaultFormatterOptions.maxDepth
}

const lineEndings: Readonly<Record<LineEnding, string>> = {
  crlf: "\r\n",
  lf: "\n"
}

/**
 * Resolve the effective config from CLI flags, file config, and defaults.
 *
 * @param cli - Parsed CLI arguments.
 * @param fileConfig - Optional config loaded from .tiered-json.json.
 * @returns Resolved configuration.
 *
 * @pure true
 * @complexity O(1)
 */
export const resolveConfig = (
  cli: CliArgs,
  fileConfig: FileConfig | undefined
): ResolvedConfig => ({
  tier: cli.tier ?? fileConfig?.tier ?? defaultConfig.tier,
  indent: cli.indent ?? fileConfig?.indent ?? defaultConfig.indent,
  align: cli.align ?? fileConfig?.align ?? defaultConfig.align,
  eol: cli.eol ?? fileConfig?.eol ?? defaultConfig.eol,
  encoding: cli.encoding ?? fileConfig?.encoding ?? defaultConfig.encoding,
  maxDepth: cli.maxDepth ?? fileConfig?.maxDepth ?? defaultConfig.maxDepth
})

/** Layout for the formatter; a missing indent falls back to the 4-space default. */
export const formatterOptionsFor = (config: ResolvedConfig): FormatterOptions => {
  const lineEnding = lineEndings[config.eol]
  return {
    alignBase: config.align,
    indentWidth: config.indent ?? defaultFormatterOptions.indentWidth,
    itemSeparator: `,${lineEnding}`,
    keySeparator: defaultFormatterOptions.keySeparator,
    lineEnding,
    maxDepth: config.maxDepth
  }
}
