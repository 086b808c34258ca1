export { ArgsSource, type ArgsSourceOptions } from "./adapters/args/args-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/dotenv/dotenv-source"
export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { ObjectSource } from "./adapters/object/object-source"
export {
  type ArgToken,
  argsToTrees,
  COMMAND_LINE_ARGUMENTS,
  classifyArg,
  type FromArgsOptions,
  fromArgs,
} from "./core/cli"
export {
  bigintCodec,
  booleanCodec,
  intCodec,
  numberCodec,
  stringCodec,
  urlCodec,
  uuidCodec,
  zodCodec,
} from "./core/codecs"
export { Config } from "./core/config"
export {
  bigint,
  boolean,
  combine,
  from,
  int,
  left,
  list,
  nested,
  number,
  optional,
  orElse,
  orElseEither,
  refine,
  right,
  schemaValue,
  sequenceOf,
  string,
  transform,
  transformOrFail,
  url,
  uuid,
  value,
  withDefault,
  withDescription,
  zip,
} from "./core/descriptor"
export {
  type DocEntry,
  generateDocs,
  LIST_ELEMENT,
  renderDocPath,
  renderDocs,
} from "./core/docs"
export { ConfigReadError, ConfigSourceError, DescriptorCollisionError } from "./core/errors"
export { type FlattenStringOptions, flatten, flattenString, unflatten } from "./core/flatten"
export {
  type FromMapOptions,
  type FromMultiMapOptions,
  fromMap,
  fromMultiMap,
  mapToTrees,
  multiMapToTrees,
} from "./core/from-map"
export { fromJsonValue, toJson } from "./core/json"
export { type LoadConfigOptions, loadConfig } from "./core/load"
export { dropEmpty, merge, mergeAll, unwrapSingletonLists } from "./core/merge"
export { renderPath } from "./core/path"
export { prettyPrint, REPORT_HEADER } from "./core/pretty-print"
export { read } from "./core/read"
export {
  emptySource,
  fromFunction,
  fromTree,
  fromTrees,
  mergeSources,
  toLoadedSource,
} from "./core/source"
export {
  EMPTY,
  fromPath,
  getPath,
  isEmpty,
  leaf,
  mapTree,
  record,
  recordOf,
  sequence,
  zipWith,
} from "./core/tree"
export { write } from "./core/write"
export type { IConfig } from "./ports/config"
export type {
  Conversion,
  Descriptor,
  Either,
  ValueCodec,
} from "./ports/descriptor"
export type {
  ConfigPath,
  Origin,
  ReadError,
  ReadFailure,
  ReadResult,
  WriteError,
  WriteResult,
} from "./ports/result"
export {
  type ConfigSource,
  LeafForSequence,
  type LoadedSource,
  type Resolution,
  type SourceLoader,
} from "./ports/source"
export type {
  EmptyNode,
  FlatEntry,
  JsonValue,
  LeafNode,
  PathSegment,
  PropertyTree,
  RecordNode,
  SequenceNode,
} from "./ports/tree"
