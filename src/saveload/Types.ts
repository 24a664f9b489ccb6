/**
 * Save/load type definitions
 * 存档/读档类型定义
 */

import type { ComponentCtor, ComponentType, Entity } from '../utils/Types';

/**
 * Dense, operation-scoped identifier that stands in for a live entity in a stream
 * 在数据流中代替存活实体的、仅在单次操作内有效的稠密标识
 */
export type Ordinal = number;

/**
 * Capability surface the engine needs from an ECS world
 * 引擎所需的ECS世界能力接口
 */
export interface PersistableWorld {
  entityHasComponent<T>(entity: Entity, type: ComponentType<T>): boolean;
  getEntityComponent<T>(entity: Entity, type: ComponentType<T>): T | undefined;
  addComponentToEntity<T>(entity: Entity, type: ComponentType<T>, component: T): void;
  /** All entities carrying a component of `type` 所有拥有该类型组件的实体 */
  entitiesWith<T>(type: ComponentType<T>): Entity[];
  createEntity(): Entity;
  /** Destroy every entity, used when loading with `clearWorld` 销毁所有实体，用于 `clearWorld` 读档 */
  clear?(): void;
}

/**
 * Rewrites every entity-valued field of a component through `map`
 * 通过 `map` 重写组件中所有实体类型的字段
 *
 * Must return a copy and leave `component` untouched.
 * 必须返回副本，不得修改 `component`。
 */
export type MapEntities<T> = (component: T, map: EntityMap) => T;

/**
 * Translation function applied to a single entity-valued field
 * 作用于单个实体字段的转换函数
 */
export type EntityMap = (entity: Entity) => Entity;

/**
 * Per-type serialization settings given at registration
 * 注册时提供的按类型序列化设置
 */
export interface ComponentSerde<T> {
  /** Stable type tag written to the stream, defaults to the constructor name 写入数据流的稳定类型标签，默认为构造函数名 */
  tag?: string;
  /** Convert a component into plain structured data 将组件转换为结构化数据 */
  serialize?: (component: T) => unknown;
  /** Rebuild a component from stream data 从数据流数据重建组件 */
  deserialize?: (data: unknown) => T;
  /** Visit entity-valued fields 访问实体类型字段 */
  mapEntities?: MapEntities<T>;
}

/**
 * One (ordinal, payload) pair of a type block
 * 类型块中的一条（序号，载荷）记录
 */
export type SerializedRecord = [ordinal: Ordinal, payload: unknown];

/**
 * All records of one component type
 * 某一组件类型的所有记录
 */
export interface TypeBlock {
  type: string;
  records: SerializedRecord[];
}

/**
 * Format tag of the current stream layout
 * 当前数据流布局的格式标签
 */
export const SAVE_STREAM_FORMAT = 'ecs-saveload/stream@1';

/**
 * Serialized stream produced by a save
 * 存档生成的序列化数据流
 */
export interface SaveStream {
  format: typeof SAVE_STREAM_FORMAT;
  /** Size of the marked set; ordinals lie in [0, entityCount) 标记集大小；序号位于 [0, entityCount) */
  entityCount: number;
  blocks: TypeBlock[];
}

/**
 * Stream encodings
 * 数据流编码格式
 */
export enum StreamFormat {
  /** superjson text, human-readable superjson文本，便于阅读 */
  JSON = 'json',
  /** MessagePack bytes MessagePack二进制 */
  Binary = 'binary'
}

/**
 * Minimal logging sink
 * 最小日志接口
 */
export type PersistenceLogger = Pick<Console, 'debug' | 'warn'>;

/**
 * Persistence configuration
 * 持久化配置
 */
export interface PersistenceOptions {
  /** Marker component flagging entities for persistence 标记需持久化实体的组件 */
  marker: ComponentCtor<object>;
  /** Encoding used by saveEncoded/encode 编码格式 */
  format: StreamFormat;
  /** Indent JSON output 格式化JSON输出 */
  prettyPrint: boolean;
  /** Give every loaded entity the marker again 为读入的实体重新添加标记 */
  restoreMarkers: boolean;
  /** Clear the destination world before loading 读档前清空目标世界 */
  clearWorld: boolean;
  /** Fail on stream blocks whose tag is not in the type list 遇到类型列表之外的块时失败 */
  strict: boolean;
  /** Log a summary of every save and load 记录每次存读档摘要 */
  verbose: boolean;
  logger: PersistenceLogger;
}

/**
 * Outcome of a load
 * 读档结果
 */
export interface LoadResult {
  /** Ordinal → live entity for every entity the load allocated 本次读档分配的序号到实体映射 */
  entities: ReadonlyMap<Ordinal, Entity>;
  /** Number of components attached 挂载的组件数 */
  components: number;
  /** Stream blocks skipped because their tag was not listed 因未列出而跳过的块标签 */
  skippedBlocks: string[];
}
