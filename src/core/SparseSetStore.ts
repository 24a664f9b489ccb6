/**
 * Sparse-set component storage keyed by entity slot
 * 以实体槽位为键的稀疏集组件存储
 */

import { type Entity, indexOf } from '../utils/Types';

/**
 * Interface for component storage implementations
 * 组件存储实现接口
 */
export interface IComponentStore<T> {
  /**
   * Check if entity has component
   * 检查实体是否拥有组件
   */
  has(entity: Entity): boolean;

  /**
   * Get component for entity
   * 获取实体的组件
   */
  get(entity: Entity): T | undefined;

  /**
   * Add or overwrite component of entity
   * 添加或覆盖实体的组件
   */
  add(entity: Entity, value: T): void;

  /**
   * Remove component from entity
   * 从实体移除组件
   */
  remove(entity: Entity): void;

  /**
   * Get number of stored components
   * 获取存储的组件数量
   */
  size(): number;

  /**
   * Entities owning a component, in dense order
   * 拥有组件的实体（按稠密顺序）
   */
  entities(): Entity[];

  /**
   * Iterate over all components
   * 遍历所有组件
   */
  forEach(callback: (entity: Entity, value: T) => void): void;

  /**
   * Drop every stored component
   * 清除所有存储的组件
   */
  clear(): void;
}

/**
 * Sparse-Set component store with O(1) operations
 * 支持O(1)操作的稀疏集组件存储
 *
 * The dense array keeps full generation-tagged handles, so a stale handle that
 * shares a slot with the current owner is reported as absent.
 * 稠密数组保存完整的带世代句柄，与当前拥有者共用槽位的过期句柄视为不存在。
 */
export class SparseSetStore<T> implements IComponentStore<T> {
  // Sparse array: entityIndex -> denseIndex (-1 means none)
  // 稀疏数组：实体索引 -> 稠密索引（-1表示无）
  private sparse = new Int32Array(1024).fill(-1);

  private dense: Entity[] = [];  // Entity handles 实体句柄
  private values: T[] = [];      // Component values 组件值

  /**
   * Ensure sparse array has capacity for entity index
   * 确保稀疏数组对实体索引有容量
   */
  private ensureSparse(entityIndex: number): void {
    if (entityIndex < this.sparse.length) return;
    let newSize = this.sparse.length || 1;
    while (newSize <= entityIndex) {
      newSize <<= 1;
    }
    const newSparse = new Int32Array(newSize).fill(-1);
    newSparse.set(this.sparse);
    this.sparse = newSparse;
  }

  private denseIndexOf(entity: Entity): number {
    const index = indexOf(entity);
    if (index >= this.sparse.length) return -1;
    const denseIndex = this.sparse[index];
    if (denseIndex === -1 || this.dense[denseIndex] !== entity) return -1;
    return denseIndex;
  }

  has(entity: Entity): boolean {
    return this.denseIndexOf(entity) !== -1;
  }

  get(entity: Entity): T | undefined {
    const denseIndex = this.denseIndexOf(entity);
    return denseIndex === -1 ? undefined : this.values[denseIndex];
  }

  add(entity: Entity, value: T): void {
    const index = indexOf(entity);
    this.ensureSparse(index);

    const current = this.sparse[index];
    if (current !== -1) {
      // Overwrite, also replacing a stale owner of the same slot
      // 覆盖，同槽位的过期拥有者也一并替换
      this.dense[current] = entity;
      this.values[current] = value;
      return;
    }

    this.sparse[index] = this.dense.length;
    this.dense.push(entity);
    this.values.push(value);
  }

  remove(entity: Entity): void {
    const denseIndex = this.denseIndexOf(entity);
    if (denseIndex === -1) return;

    const lastIndex = this.dense.length - 1;

    // Swap with last element 与尾元素交换
    const lastEntity = this.dense[lastIndex];
    this.dense[denseIndex] = lastEntity;
    this.values[denseIndex] = this.values[lastIndex];
    this.sparse[indexOf(lastEntity)] = denseIndex;

    // Remove last element 移除尾元素
    this.dense.pop();
    this.values.pop();
    this.sparse[indexOf(entity)] = -1;
  }

  size(): number {
    return this.dense.length;
  }

  entities(): Entity[] {
    return this.dense.slice();
  }

  forEach(callback: (entity: Entity, value: T) => void): void {
    for (let i = 0; i < this.dense.length; i++) {
      callback(this.dense[i], this.values[i]);
    }
  }

  clear(): void {
    this.sparse.fill(-1);
    this.dense.length = 0;
    this.values.length = 0;
  }
}
