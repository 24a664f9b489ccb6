/**
 * Entity lifecycle manager
 * 实体生命周期管理器
 *
 * Handles creation, destruction and reuse of entity slots using pure numeric
 * handles with generation numbers. A destroyed slot is recycled with a bumped
 * generation, so stale handles never alias the new occupant.
 * 使用带世代号的纯数字句柄处理实体槽位的创建、销毁和复用。
 * 被销毁的槽位以递增的世代号回收，旧句柄不会与新实体混淆。
 */

import { type Entity, makeEntity, indexOf, genOf, MAX_ENTITY_INDEX, MAX_GENERATION } from '../utils/Types';

/**
 * EntityManager manages entity lifecycle with generation-based handles
 * EntityManager使用基于世代的句柄管理实体生命周期
 */
export class EntityManager {
  private generations: Uint32Array;
  private alive: Uint8Array;
  private free: number[] = [];
  private nextIndex = 1; // index 0 reserved for the null handle
  private _aliveCount = 0;

  /**
   * Create new EntityManager with initial capacity
   * 创建具有初始容量的新EntityManager
   */
  constructor(initialCapacity = 1024) {
    this.generations = new Uint32Array(initialCapacity);
    this.alive = new Uint8Array(initialCapacity);
  }

  /**
   * Ensure arrays have capacity for the given index
   * 确保数组对给定索引有容量
   */
  private ensure(index: number): void {
    if (index < this.generations.length) return;

    let newSize = this.generations.length || 1;
    while (newSize <= index) {
      newSize <<= 1;
    }

    const newGenerations = new Uint32Array(newSize);
    newGenerations.set(this.generations);
    this.generations = newGenerations;

    const newAlive = new Uint8Array(newSize);
    newAlive.set(this.alive);
    this.alive = newAlive;
  }

  /**
   * Create a new entity, reusing the most recently freed slot first
   * 创建新实体，优先复用最近释放的槽位
   */
  create(): Entity {
    const recycled = this.free.pop();
    const index = recycled ?? this.nextIndex++;
    if (index > MAX_ENTITY_INDEX) {
      throw new Error(`EntityManager: entity index space exhausted (${MAX_ENTITY_INDEX})`);
    }
    this.ensure(index);

    this.alive[index] = 1;
    this._aliveCount++;

    return makeEntity(index, this.generations[index]);
  }

  /**
   * Destroy an entity; returns false for dead or stale handles
   * 销毁实体；对已死亡或过期句柄返回false
   */
  destroy(entity: Entity): boolean {
    if (!this.isAlive(entity)) return false;

    const index = indexOf(entity);
    this.alive[index] = 0;
    this.generations[index] = (this.generations[index] + 1) & MAX_GENERATION;
    this.free.push(index);
    this._aliveCount--;

    return true;
  }

  /**
   * Check if entity is alive
   * 检查实体是否存活
   */
  isAlive(entity: Entity): boolean {
    const index = indexOf(entity);
    return index > 0 &&
           index < this.generations.length &&
           this.alive[index] === 1 &&
           this.generations[index] === genOf(entity);
  }

  /**
   * Get count of alive entities
   * 获取存活实体数量
   */
  aliveCount(): number {
    return this._aliveCount;
  }

  /**
   * Get all alive entities in ascending slot order
   * 按槽位升序获取所有存活实体
   */
  getAllAliveEntities(): Entity[] {
    const entities: Entity[] = [];
    for (let i = 1; i < this.nextIndex; i++) {
      if (this.alive[i] === 1) {
        entities.push(makeEntity(i, this.generations[i]));
      }
    }
    return entities;
  }

  /**
   * Clear all entities
   * 清空所有实体
   */
  clear(): void {
    // Bump generations of live slots so handles issued before the clear stay dead
    // 递增存活槽位的世代号，使清空前发出的句柄保持失效
    for (let i = 1; i < this.nextIndex; i++) {
      if (this.alive[i] === 1) {
        this.generations[i] = (this.generations[i] + 1) & MAX_GENERATION;
      }
    }
    this.alive.fill(0);
    this.free.length = 0;
    for (let i = this.nextIndex - 1; i >= 1; i--) {
      this.free.push(i);
    }
    this._aliveCount = 0;
  }
}
