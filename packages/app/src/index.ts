export type { CliArgs, CliCommand, CliError, LineEnding } from "./core/cli.js"
export { decodeInput, dumps, format, JSON_ENCODING, loads, loadsAs } from "./core/codec.js"
export type { DumpsOptions, FormatOptions, Input, LoadsOptions } from "./core/codec.js"
export {
  advancedDecoderTier,
  basicDecoderTier,
  customDecoderTier,
  decoderTiers,
  defaultDecoderOptions,
  makeDecoder
} from "./core/decoder.js"
export type { Decoder, DecoderOptions, DecoderTier } from "./core/decoder.js"
export {
  advancedEncoderTier,
  basicEncoderTier,
  customEncoderTier,
  defaultEncoderOptions,
  encoderTiers,
  makeEncoder
} from "./core/encoder.js"
export type { EncodeContext, Encoded, Encoder, EncoderOptions, EncoderTier, Probe } from "./core/encoder.js"
export { castingError, malformedInput, renderError, unsupportedType } from "./core/errors.js"
export type { AppError, CastingError, CodecError, ConfigError, FileError, MalformedInput, UnsupportedType } from "./core/errors.js"
export { Complex, PlainDate, PlainTime, Slice, Uuid, makeUuid } from "./core/extended.js"
export { defaultFormatterOptions, makeFormatter } from "./core/formatter.js"
export type { Formatter, FormatterOptions } from "./core/formatter.js"
export { isSequence, isTier, isValueObject, tiers, valueObject } from "./core/json.js"
export type { Extended, Scalar, Tier, Value, ValueObject } from "./core/json.js"
export { advancedObjectRecognizers, advancedStringRecognizers } from "./core/recognizers.js"
export type { ObjectRecognizer, StringRecognizer } from "./core/recognizers.js"
export { JsonFields, JsonState, JsonText } from "./core/reflect.js"
export type { HasJsonFields, HasJsonState, HasJsonText } from "./core/reflect.js"
export { makeCustomDecoder, reconstruct, targetType } from "./core/target.js"
export type { CustomDecoder, TargetType } from "./core/target.js"
export { dump, load, loadAs } from "./shell/io.js"
