/**
 * Live entity ↔ stream ordinal translation
 * 存活实体与数据流序号之间的转换
 *
 * A translator belongs to exactly one save or one load and is dropped when the
 * operation ends; ordinals never resolve against another world.
 * 每个转换器只属于一次存档或读档，操作结束即丢弃；序号不会在其他世界中解析。
 */

import type { Entity } from '../utils/Types';
import type { Ordinal } from './Types';
import { DuplicateEntityError, UnknownEntityError } from './Errors';

/**
 * Save direction: assigns ordinal i to the i-th marked entity
 * 存档方向：为第i个被标记的实体分配序号i
 */
export class SaveTranslator {
  private readonly ordinals = new Map<Entity, Ordinal>();

  private constructor(private readonly order: readonly Entity[]) {
    order.forEach((entity, i) => {
      if (this.ordinals.has(entity)) {
        throw new DuplicateEntityError(entity);
      }
      this.ordinals.set(entity, i);
    });
  }

  /**
   * Start a save over the given entities, in the given order
   * 以给定顺序为这些实体开始一次存档
   */
  static begin(entities: readonly Entity[]): SaveTranslator {
    return new SaveTranslator(entities.slice());
  }

  toOrdinal(entity: Entity): Ordinal {
    const ordinal = this.ordinals.get(entity);
    if (ordinal === undefined) {
      throw UnknownEntityError.forEntity(entity);
    }
    return ordinal;
  }

  has(entity: Entity): boolean {
    return this.ordinals.has(entity);
  }

  /** Entities in ordinal order 按序号排列的实体 */
  entities(): readonly Entity[] {
    return this.order;
  }

  get size(): number {
    return this.order.length;
  }
}

/**
 * Load direction: get-or-create table from ordinals to live entities
 * 读档方向：序号到存活实体的获取或创建表
 *
 * Forward references and an entity's own records converge on one live entity
 * regardless of the order blocks are visited in.
 * 无论按何种顺序访问类型块，前向引用与实体自身的记录都会指向同一个存活实体。
 */
export class LoadTranslator {
  private readonly live = new Map<Ordinal, Entity>();

  /**
   * @param allocate creates a fresh live entity 创建新的存活实体
   * @param entityCount ordinals must be below this bound when given 给定时序号必须小于此值
   */
  constructor(
    private readonly allocate: () => Entity,
    private readonly entityCount?: number
  ) {}

  toLive(ordinal: Ordinal): Entity {
    const existing = this.live.get(ordinal);
    if (existing !== undefined) return existing;

    if (!Number.isInteger(ordinal) || ordinal < 0 ||
        (this.entityCount !== undefined && ordinal >= this.entityCount)) {
      throw UnknownEntityError.forOrdinal(ordinal, this.entityCount);
    }

    const entity = this.allocate();
    this.live.set(ordinal, entity);
    return entity;
  }

  /**
   * Allocate every ordinal below the entity count not seen yet, in ascending order
   * 按升序为尚未出现的、小于实体数的所有序号分配实体
   *
   * @returns number of entities allocated 新分配的实体数
   */
  allocateAll(): number {
    if (this.entityCount === undefined) return 0;
    const before = this.live.size;
    for (let ordinal = 0; ordinal < this.entityCount; ordinal++) {
      this.toLive(ordinal);
    }
    return this.live.size - before;
  }

  has(ordinal: Ordinal): boolean {
    return this.live.has(ordinal);
  }

  /** Ordinal → live entity for everything allocated so far 迄今分配的序号到实体映射 */
  entries(): ReadonlyMap<Ordinal, Entity> {
    return new Map(this.live);
  }

  get size(): number {
    return this.live.size;
  }
}
