export { materialize, normalizeMaterializeOptions } from './materializer';
export type { MaterializeOptions } from './materializer';
export {
  canonicalizeScalar,
  canonicalFloat,
  canonicalInteger,
  canonicalBoolean
} from './materializer/canonical';
export type { CanonicalScalar } from './materializer/canonical';

export {
  parseTomlInPlace,
  parseTomlInArena,
  parseTomlFile,
  parseJsonInPlace,
  parseJsonInArena,
  parseJsonFile
} from './parse';
export type { ParseOptions, ParseTarget } from './parse';

export { emitJson } from './emit/json-emitter';
export type { EmitOptions } from './emit/json-emitter';

export { DocumentTree } from './tree/tree';
export { NodeRef } from './tree/node-ref';
export { Arena } from './tree/arena';
export type { TextSpan } from './tree/arena';
export { NodeFlag } from './tree/types';
export type { NodeFlags, NodeId, NodeKind, TreeOptions } from './tree/types';

export {
  createValueAdapter,
  isoDateTime,
  normalizeAdapterOptions
} from './source/adapter';
export type {
  AdapterOptions,
  TemporalClassifier,
  ValueAdapter
} from './source/adapter';
export { fromToml, tomlTemporal } from './source/toml';
export { fromJson } from './source/json';
export { sourceArray, sourceTable } from './source/types';
export type {
  SourceArray,
  SourceBoolean,
  SourceFloat,
  SourceInteger,
  SourceKind,
  SourceNull,
  SourceScalar,
  SourceString,
  SourceTable,
  SourceTemporal,
  SourceUnsupported,
  SourceValue
} from './source/types';

export { DocArenaError, throwingErrorHandler } from './report';
export type { ErrorHandler, ErrorLocation, ErrorReport } from './report';
