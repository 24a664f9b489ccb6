/**
 * Cross-reference resolution for entity-valued component fields
 * 组件中实体类型字段的交叉引用解析
 *
 * Components that point at other entities supply a `mapEntities` capability.
 * On save it rewrites live entities to ordinals, on load ordinals back to live
 * entities. A field the capability misses would carry a live handle that is
 * meaningless after load.
 * 引用其他实体的组件需提供 `mapEntities` 能力。存档时把存活实体改写为序号，
 * 读档时把序号改写回存活实体。遗漏的字段会携带读档后无意义的句柄。
 */

import type { Entity } from '../utils/Types';
import type { EntityMap, MapEntities } from './Types';
import type { LoadTranslator, SaveTranslator } from './EntityTranslator';
import { EncodingError } from './Errors';

/**
 * Shape of an entity-valued field
 * 实体字段的形态
 */
export type EntityFieldKind = 'one' | 'optional' | 'many';

type FieldKindFor<V> =
  [V] extends [readonly Entity[]] ? 'many'
  : [V] extends [Entity] ? 'one'
  : [V] extends [Entity | null | undefined] ? 'optional'
  : never;

/**
 * Declares which fields of T hold entities
 * 声明T的哪些字段保存实体
 */
export type EntityFieldSpec<T> = { [K in keyof T]?: FieldKindFor<T[K]> };

/**
 * Map an optional reference; null and undefined pass through
 * 映射可选引用；null与undefined原样通过
 */
export function mapOptional(entity: Entity | null | undefined, map: EntityMap): Entity | null | undefined {
  return entity === null || entity === undefined ? entity : map(entity);
}

/**
 * Map a list of references into a new array
 * 将引用列表映射为新数组
 */
export function mapList(entities: readonly Entity[], map: EntityMap): Entity[] {
  return entities.map(e => map(e));
}

/**
 * Shallow copy keeping the prototype, so class components stay instances
 * 保留原型的浅拷贝，使类组件仍为其实例
 */
export function cloneComponent<T extends object>(component: T): T {
  const copy: T = Object.assign(Object.create(Object.getPrototypeOf(component)), component);
  return copy;
}

function isEntityValue(value: unknown): value is Entity {
  return typeof value === 'number';
}

function mapField(owner: string, key: string, kind: unknown, value: unknown, map: EntityMap): unknown {
  switch (kind) {
    case 'one':
      if (isEntityValue(value)) return map(value);
      break;
    case 'optional':
      if (value === null || value === undefined) return value;
      if (isEntityValue(value)) return map(value);
      break;
    case 'many':
      if (Array.isArray(value) && value.every(isEntityValue)) return mapList(value, map);
      break;
    default:
      throw new EncodingError(`${owner}.${key}: unknown entity field kind "${String(kind)}"`);
  }
  throw new EncodingError(`${owner}.${key}: expected ${String(kind)} entity reference, got ${value === null ? 'null' : typeof value}`);
}

/**
 * Build a `mapEntities` capability from a field declaration
 * 根据字段声明构建 `mapEntities` 能力
 *
 * @example
 * ```typescript
 * class Squad { leader = 0; medic: Entity | null = null; members: Entity[] = []; }
 * persistence.register(Squad, {
 *   mapEntities: entityFields<Squad>({ leader: 'one', medic: 'optional', members: 'many' })
 * });
 * ```
 */
export function entityFields<T extends object>(spec: EntityFieldSpec<T>): MapEntities<T> {
  const keys = Object.keys(spec);
  return (component, map) => {
    const copy = cloneComponent(component);
    const owner = component.constructor.name || 'component';
    for (const key of keys) {
      const kind: unknown = Reflect.get(spec, key);
      if (kind === undefined) continue;
      Reflect.set(copy, key, mapField(owner, key, kind, Reflect.get(component, key), map));
    }
    return copy;
  };
}

/**
 * Live entities → ordinals (save direction)
 * 存活实体 → 序号（存档方向）
 */
export function toWire<T>(component: T, mapEntities: MapEntities<T> | undefined, translator: SaveTranslator): T {
  return mapEntities ? mapEntities(component, e => translator.toOrdinal(e)) : component;
}

/**
 * Ordinals → live entities, allocating on first sight (load direction)
 * 序号 → 存活实体，首次出现时分配（读档方向）
 */
export function fromWire<T>(component: T, mapEntities: MapEntities<T> | undefined, translator: LoadTranslator): T {
  return mapEntities ? mapEntities(component, o => translator.toLive(o)) : component;
}
