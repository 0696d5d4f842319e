export { Encoder } from "./binary/encoder.js";
export type {
  EncoderOptions,
  EncoderStats,
  ReadonlyStringTable,
  ScopeHandle,
  ScopeKind,
} from "./binary/encoder.js";
export { EncodeError, EncodeErrorKind, isEncodeError } from "./binary/errors.js";
export { ByteSink } from "./binary/sink.js";
export type { OutputSink } from "./binary/sink.js";
export { StringTable } from "./binary/stringTable.js";
export { encode, encodeValue, tryEncode } from "./binary/tree.js";
export type { EncodeOptions, EncodeResult, WidthMode } from "./binary/tree.js";
export { WidthPlan, planWidths } from "./binary/analyzer.js";
export type { PackObject, PackValue } from "./binary/value.js";
export { SpecialValue, Tag } from "./binary/format.js";
export { createStreamParser, parseJsonStream, streamJsonEvents } from "./parser/streamParser.js";
export type { JsonEventSink } from "./parser/streamParser.js";
export { TreeBuilder } from "./parser/treeBuilder.js";
