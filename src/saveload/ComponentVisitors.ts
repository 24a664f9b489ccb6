/**
 * Per-type serialization and deserialization visitors
 * 按类型的序列化与反序列化访问器
 */

import type { ComponentType, Entity } from '../utils/Types';
import type { MapEntities, Ordinal, PersistableWorld, SerializedRecord } from './Types';
import type { LoadTranslator, SaveTranslator } from './EntityTranslator';
import { fromWire, toWire } from './EntityRefs';
import { EncodingError, withEncoding } from './Errors';

/**
 * Storage of a single component type, as seen by a visitor
 * 访问器所见的单一组件类型存储
 */
export interface ComponentView<T> {
  has(entity: Entity): boolean;
  get(entity: Entity): T | undefined;
}

/**
 * Narrow a world to one component type
 * 将世界收窄到单一组件类型
 */
export function viewOf<T>(world: PersistableWorld, type: ComponentType<T>): ComponentView<T> {
  return {
    has: entity => world.entityHasComponent(entity, type),
    get: entity => world.getEntityComponent(entity, type)
  };
}

/**
 * Resolved codec of one registered component type
 * 已注册组件类型的解析后编解码器
 */
export interface TypeCodec<T> {
  readonly tag: string;
  readonly type: ComponentType<T>;
  serialize(component: T): unknown;
  deserialize(data: unknown): T;
  readonly mapEntities?: MapEntities<T>;
}

/**
 * Emit (ordinal, payload) for every marked entity owning T, in ordinal order
 * 按序号顺序为每个拥有T的被标记实体输出（序号，载荷）
 */
export function serializeComponents<T>(
  codec: TypeCodec<T>,
  translator: SaveTranslator,
  view: ComponentView<T>
): SerializedRecord[] {
  const records: SerializedRecord[] = [];

  for (const entity of translator.entities()) {
    if (!view.has(entity)) continue;
    const component = view.get(entity);
    if (component === undefined) continue;

    const ordinal = translator.toOrdinal(entity);
    const payload = withEncoding(`Failed to serialize ${codec.tag} of entity ${entity}`, () =>
      codec.serialize(toWire(component, codec.mapEntities, translator))
    );
    records.push([ordinal, payload]);
  }

  return records;
}

/**
 * Rebuild T for every record and attach it to the matching live entity
 * 为每条记录重建T并挂载到对应的存活实体
 *
 * @returns number of components attached 挂载的组件数
 */
export function deserializeComponents<T>(
  codec: TypeCodec<T>,
  records: readonly SerializedRecord[],
  translator: LoadTranslator,
  world: PersistableWorld
): number {
  const seen = new Set<Ordinal>();

  for (const [ordinal, payload] of records) {
    if (seen.has(ordinal)) {
      throw new EncodingError(`Ordinal ${ordinal} appears twice in block "${codec.tag}"`);
    }
    seen.add(ordinal);

    const live = translator.toLive(ordinal);
    const component = withEncoding(`Failed to deserialize ${codec.tag} for ordinal ${ordinal}`, () =>
      fromWire(codec.deserialize(payload), codec.mapEntities, translator)
    );
    world.addComponentToEntity(live, codec.type, component);
  }

  return seen.size;
}
