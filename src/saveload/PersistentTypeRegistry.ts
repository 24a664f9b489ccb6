/**
 * Registry of persistable component types
 * 可持久化组件类型注册表
 *
 * Each registration is a (tag, serialize, deserialize, mapEntities) tuple for
 * one constructor. The driver only ever sees the type-erased `PersistentType`.
 * 每个注册项是某个构造函数的（标签，序列化，反序列化，mapEntities）组合。
 * 驱动器只接触类型擦除后的 `PersistentType`。
 */

import { getComponentType } from '../core/ComponentRegistry';
import type { ComponentCtor } from '../utils/Types';
import type { ComponentSerde, PersistableWorld, SerializedRecord, TypeBlock } from './Types';
import type { LoadTranslator, SaveTranslator } from './EntityTranslator';
import { deserializeComponents, serializeComponents, viewOf, type TypeCodec } from './ComponentVisitors';
import { EncodingError, UnsupportedTypeError } from './Errors';

/**
 * Type-erased registration the driver iterates over
 * 驱动器遍历的类型擦除注册项
 */
export interface PersistentType {
  readonly tag: string;
  readonly typeId: number;
  /** Constructor name, for messages 构造函数名，用于消息 */
  readonly name: string;
  save(translator: SaveTranslator, world: PersistableWorld): TypeBlock;
  load(records: readonly SerializedRecord[], translator: LoadTranslator, world: PersistableWorld): number;
}

function isPlainRecord(data: unknown): data is object {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return false;
  const proto: unknown = Object.getPrototypeOf(data);
  return proto === Object.prototype || proto === null;
}

/**
 * Default payload: shallow copy of own fields
 * 默认载荷：自有字段的浅拷贝
 */
export function defaultSerialize<T extends object>(component: T): unknown {
  return { ...component };
}

/**
 * Default rebuild: fresh instance with the payload's fields assigned over it
 * 默认重建：新实例并覆盖载荷中的字段
 */
export function defaultDeserialize<T extends object>(ctor: ComponentCtor<T>, data: unknown): T {
  if (data === undefined || data === null) {
    return new ctor();
  }
  if (!isPlainRecord(data)) {
    throw new EncodingError(`${ctor.name} payload must be a plain object, got ${Array.isArray(data) ? 'array' : typeof data}`);
  }
  return Object.assign(new ctor(), data);
}

/**
 * Bind a constructor and its serde into a type-erased registration
 * 将构造函数与其序列化设置绑定为类型擦除的注册项
 */
export function createPersistentType<T extends object>(
  ctor: ComponentCtor<T>,
  serde: ComponentSerde<T> = {}
): PersistentType {
  const tag = serde.tag ?? ctor.name;
  if (tag.trim().length === 0) {
    throw new Error('Persistent type tag must be a non-empty string; pass { tag } for anonymous classes');
  }

  const type = getComponentType(ctor);
  const codec: TypeCodec<T> = {
    tag,
    type,
    serialize: serde.serialize ?? defaultSerialize,
    deserialize: serde.deserialize ?? (data => defaultDeserialize(ctor, data)),
    mapEntities: serde.mapEntities
  };

  return {
    tag,
    typeId: type.id,
    name: ctor.name,
    save: (translator, world) => ({
      type: tag,
      records: serializeComponents(codec, translator, viewOf(world, type))
    }),
    load: (records, translator, world) => deserializeComponents(codec, records, translator, world)
  };
}

/**
 * Registry of persistent types keyed by constructor
 * 以构造函数为键的持久化类型注册表
 *
 * @example
 * ```typescript
 * const registry = new PersistentTypeRegistry();
 * registry.register(Position);
 * registry.register(Target, { mapEntities: entityFields<Target>({ ref: 'one' }) });
 * registry.resolve([Position, Target]); // [PersistentType, PersistentType]
 * ```
 */
export class PersistentTypeRegistry {
  private byCtor = new Map<ComponentCtor<object>, PersistentType>();
  private ctorByTag = new Map<string, ComponentCtor<object>>();

  /**
   * Register a component type; registering the same constructor again replaces it
   * 注册组件类型；重复注册同一构造函数会替换原有设置
   */
  register<T extends object>(ctor: ComponentCtor<T>, serde?: ComponentSerde<T>): PersistentType {
    const entry = createPersistentType(ctor, serde);

    const owner = this.ctorByTag.get(entry.tag);
    if (owner !== undefined && owner !== ctor) {
      throw new Error(`Tag "${entry.tag}" is already used by ${owner.name || 'another component'}`);
    }

    const previous = this.byCtor.get(ctor);
    if (previous !== undefined) {
      this.ctorByTag.delete(previous.tag);
    }

    this.byCtor.set(ctor, entry);
    this.ctorByTag.set(entry.tag, ctor);
    return entry;
  }

  unregister(ctor: ComponentCtor<object>): boolean {
    const entry = this.byCtor.get(ctor);
    if (entry === undefined) return false;
    this.ctorByTag.delete(entry.tag);
    return this.byCtor.delete(ctor);
  }

  has(ctor: ComponentCtor<object>): boolean {
    return this.byCtor.has(ctor);
  }

  get(ctor: ComponentCtor<object>): PersistentType | undefined {
    return this.byCtor.get(ctor);
  }

  /** Registered tags in registration order 按注册顺序的标签 */
  tags(): string[] {
    return Array.from(this.ctorByTag.keys());
  }

  /**
   * Resolve a caller type list into registrations, in list order
   * 按列表顺序将调用方类型列表解析为注册项
   *
   * @throws UnsupportedTypeError for an unregistered or repeated type 类型未注册或重复时抛出
   */
  resolve(types: readonly ComponentCtor<object>[]): PersistentType[] {
    const seen = new Set<ComponentCtor<object>>();
    return types.map(ctor => {
      const name = ctor.name || 'anonymous component';
      if (seen.has(ctor)) {
        throw new UnsupportedTypeError(`Type ${name} appears more than once in the type list`, name);
      }
      seen.add(ctor);

      const entry = this.byCtor.get(ctor);
      if (entry === undefined) {
        throw new UnsupportedTypeError(`Type ${name} is not registered for persistence`, name);
      }
      return entry;
    });
  }
}
