// AST
export {
  ArrayNode,
  BooleanNode,
  Node,
  type NodeKind,
  NULL,
  NullNode,
  NumberNode,
  ObjectBuilder,
  type ObjectField,
  ObjectNode,
  StringNode,
} from "./ast/nodes";
// Core
export {
  DEFAULT_MAX_DEPTH,
  DEFAULT_MAX_INPUT_LENGTH,
  resolveParseOptions,
} from "./core/config";
export { JSONParser } from "./core/parser";
export {
  createJSONStream,
  JSONTransformStream,
  parseFromStream,
  processJSONStream,
} from "./core/stream";
export { JSONTokenizer } from "./core/tokenizer";
export type { OnErrorFn, ParseOptions, Token } from "./core/types";
// Destination types
export {
  ArrayType,
  FixedArrayType,
  LazyType,
  MapType,
  OptionalType,
  RecordType,
} from "./decode/containers";
export {
  anyType,
  CustomType,
  type CustomTypeDefinition,
  InterfaceType,
  isJSONValue,
  type JSONValue,
  NodeType,
} from "./decode/dynamic";
export { type Infer, t } from "./decode/index";
export {
  asString,
  DecodeContext,
  type DecodeOption,
  type DecodeOptions,
  DEFAULT_MAX_DECODE_DEPTH,
  disallowUnknownFields,
  elementOptions,
  withContext,
  withEncoding,
  withEncodings,
  withMaxDepth,
  withOnError,
  withTypes,
} from "./decode/options";
export {
  BigIntType,
  BooleanType,
  BytesType,
  DecimalType,
  FloatType,
  Int64Type,
  IntType,
  StringType,
  TimeType,
} from "./decode/scalars";
export {
  isNodeDecoder,
  isTextUnmarshaler,
  type NodeDecoder,
  type StructFields,
  StructType,
  type TextUnmarshaler,
} from "./decode/struct";
export {
  type FieldSpec,
  ref,
  type Slot,
  Type,
  type TypeKind,
} from "./decode/type";
// Errors
export {
  type DecodeErrorCode,
  isTJSONError,
  type ParseErrorCode,
  TJSONConfigError,
  TJSONDecodeError,
  TJSONEncodingError,
  TJSONParseError,
  TJSONRegistryError,
  TJSONStreamError,
} from "./errors/types";
// Entry points
export {
  type DecodeResult,
  Decoder,
  type Input,
  parse,
  readDocuments,
  unmarshal,
  unmarshalInto,
} from "./parse";
// Registries
export { base64, type Encoding, hex } from "./registry/encoding";
export {
  createEncodingRegistry,
  defaultEncodingRegistry,
  EncodingRegistry,
  registerEncoding,
} from "./registry/encoding-registry";
export {
  defaultTypeRegistry,
  registerType,
  type TypeConstructor,
  TypeRegistry,
} from "./registry/type-registry";
// Struct introspection
export {
  type ParsedTag,
  parseTag,
  type StructField,
  visibleFields,
} from "./schema/fields";
