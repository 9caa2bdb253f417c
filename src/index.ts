// src/index.ts
// baml-bridge - Public API
//
// Typed schemas for BAML from shape descriptors, value conversion in both
// directions, union resolution for rendering and streaming type views.

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

export { Bridge, createBridge, loadBridge, type BridgeOptions, type LoadBridgeOptions } from "./bridge";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE IR
// ═══════════════════════════════════════════════════════════════════════════════

export type {
  LiteralValue,
  MediaType,
  StreamingMode,
  TypeGeneric,
  TypeIR,
  TypeNonStreaming,
  TypeStreaming,
  TypeValue,
  UnionType,
} from "./typeir/types";
export {
  assertion,
  check,
  hasChecks,
  hasConstraints,
  hasStreamState,
  irMeta,
  nonStreamingMeta,
  streamingMeta,
  type Constraint,
  type ConstraintLevel,
  type IRMeta,
  type MetaBase,
  type NonStreamingMeta,
  type StreamingBehavior,
  type StreamingMeta,
} from "./typeir/meta";
export * as t from "./typeir/builders";
export { isNullType, isOptionalUnion, iterIncludeNull, iterSkipNull, makeUnionType, viewUnion, type UnionView } from "./typeir/union";
export { displayType, literalToString, typeEquals, typeShapeEquals } from "./typeir/display";
export { flattenUnionMembers, simplify, simplifyUnion } from "./typeir/simplify";
export { children, classDependencies, enumDependencies, findIf, mapMeta, renameRefs } from "./typeir/visitor";
export { canonicalEquals, encodeCanonical } from "./typeir/codec";
export { hashType, type TypeHash } from "./typeir/hash";
export {
  findField,
  makeName,
  renderedName,
  type ClassDef,
  type ClassField,
  type EnumDef,
  type EnumValueDef,
  type Name,
  type TypeLookups,
} from "./typeir/definitions";
export {
  mergeModes,
  streamingMode,
  toIrType,
  toNonStreamingType,
  toStreamingType,
  withStreamState,
  type CompletionState,
  type StreamState,
} from "./typeir/streaming";

// ═══════════════════════════════════════════════════════════════════════════════
// VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export {
  I64_MAX,
  I64_MIN,
  NULL,
  describeValue,
  entriesOf,
  vBool,
  vClass,
  vEnum,
  vFloat,
  vInt,
  vList,
  vMap,
  vMedia,
  vNull,
  vString,
  valueEquals,
  type BamlMedia,
  type BamlValue,
  type BamlValueTag,
  type MediaContent,
} from "./value/value";
export { ValuePath, type PathSegment } from "./value/path";
export { toPlain, type PlainValue } from "./value/plain";

// ═══════════════════════════════════════════════════════════════════════════════
// SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

export * as shapes from "./schema/shapes";
export type * from "./schema/shape";
export type { FieldCodec, FieldCodecRegisterContext } from "./schema/adapters";
export {
  DEFAULT_TAG_FIELD,
  SchemaBuilder,
  buildSchema,
  buildTypeIR,
  mapEntryNames,
  type SchemaBuildOptions,
  type SchemaBundle,
} from "./schema/builder";
export { OutputFormat, SchemaRegistry, computeRecursiveClasses } from "./schema/registry";
export { SchemaCache, defaultSchemaCache } from "./schema/cache";
export { schemaFingerprint, type SchemaFingerprint } from "./schema/fingerprint";
export { SchemaBuildError, type SchemaBuildErrorKind } from "./schema/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSION
// ═══════════════════════════════════════════════════════════════════════════════

export { toBamlValue, type ToValueOptions } from "./convert/to-value";
export { fromBamlValue, type FromValueOptions } from "./convert/from-value";
export { coerceValue, type CoerceOptions, type Coerced, type CoercionFlag, type Explanation } from "./convert/coerce";
export {
  ConstraintAssertsFailedError,
  NunjucksEvaluator,
  evaluateConstraints,
  type ConstraintEvaluator,
  type ResponseCheck,
} from "./convert/constraints";
export { BamlConvertError, InvariantViolationError, type ConvertErrorKind } from "./convert/errors";
export { parseOutcome, parseValue, type ParseOptions, type Parsed } from "./convert/parse";

// ═══════════════════════════════════════════════════════════════════════════════
// UNION RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════════

export { resolveUnion, scoreCandidate, type Resolution } from "./resolve/union";
export { AmbiguousUnionError, PromptValue } from "./resolve/prompt-value";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES, CONFIG, LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export type { Done, Fail, Outcome, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export { done, err, fail } from "./outcome/constructors";
export { failure, type Failure, type FailureReason } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { flatMapOutcome } from "./outcome/matchers";

export {
  DEFAULT_CONFIG,
  DEFAULT_RENDER_OPTIONS,
  InvalidConfigError,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
  type BamlBridgeConfig,
  type RenderOptions,
} from "./config/config";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./log/logger";
