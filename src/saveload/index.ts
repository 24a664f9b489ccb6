/**
 * Selective save/load of marked entities
 * 被标记实体的选择性存档/读档
 */

export { WorldPersistence, DEFAULT_PERSISTENCE_OPTIONS } from './WorldPersistence';
export { MarkerRegistry, SerializeMe } from './Marker';
export { SaveTranslator, LoadTranslator } from './EntityTranslator';
export {
  PersistentTypeRegistry,
  createPersistentType,
  defaultSerialize,
  defaultDeserialize
} from './PersistentTypeRegistry';
export type { PersistentType } from './PersistentTypeRegistry';
export { runSave, runLoad } from './TypeVisitationDriver';
export { serializeComponents, deserializeComponents, viewOf } from './ComponentVisitors';
export type { ComponentView, TypeCodec } from './ComponentVisitors';
export { entityFields, mapOptional, mapList, cloneComponent, toWire, fromWire } from './EntityRefs';
export type { EntityFieldKind, EntityFieldSpec } from './EntityRefs';
export { encodeStream, decodeStream, copyStream, formatOf } from './StreamCodec';
export type { EncodedStream, EncodeOptions } from './StreamCodec';
export { SaveStreamSchema, parseStream } from './StreamSchema';
export { summarizeStream } from './Inspect';
export type { BlockSummary, StreamSummary } from './Inspect';
export {
  SaveLoadError,
  UnknownEntityError,
  DuplicateEntityError,
  UnsupportedTypeError,
  EncodingError,
  withEncoding
} from './Errors';
export type { SaveLoadErrorKind } from './Errors';
export { SAVE_STREAM_FORMAT, StreamFormat } from './Types';
export type {
  Ordinal,
  PersistableWorld,
  MapEntities,
  EntityMap,
  ComponentSerde,
  SerializedRecord,
  TypeBlock,
  SaveStream,
  PersistenceLogger,
  PersistenceOptions,
  LoadResult
} from './Types';
