/**
 * World class - entity allocator plus per-type sparse-set component stores
 * World类 - 实体分配器加按类型划分的稀疏集组件存储
 */

import { EntityManager } from './EntityManager';
import type { Entity, ComponentCtor, ComponentType } from '../utils/Types';
import { getComponentType } from './ComponentRegistry';
import { SparseSetStore, type IComponentStore } from './SparseSetStore';

/**
 * World manages all entities and components
 * World管理所有实体和组件
 *
 * @example
 * ```typescript
 * const world = new World();
 * const e = world.createEntity();
 * world.addComponent(e, Position, { x: 1, y: 2 });
 * world.getComponent(e, Position); // Position { x: 1, y: 2 }
 * ```
 */
export class World {
  private em = new EntityManager();
  private stores = new Map<number, IComponentStore<unknown>>();

  /**
   * Create new entity
   * 创建新实体
   */
  createEntity(): Entity {
    return this.em.create();
  }

  /**
   * Destroy entity and remove all its components
   * 销毁实体并移除其所有组件
   */
  destroyEntity(e: Entity): void {
    if (!this.em.isAlive(e)) return;
    for (const store of this.stores.values()) {
      store.remove(e);
    }
    this.em.destroy(e);
  }

  /**
   * Check if entity is alive
   * 检查实体是否存活
   */
  isAlive(entity: Entity): boolean {
    return this.em.isAlive(entity);
  }

  /**
   * Get number of alive entities
   * 获取存活实体数量
   */
  aliveCount(): number {
    return this.em.aliveCount();
  }

  /**
   * Get all alive entities
   * 获取所有存活的实体
   */
  getAllAliveEntities(): Entity[] {
    return this.em.getAllAliveEntities();
  }

  /**
   * Get or create component store for type
   * 获取或创建类型的组件存储
   */
  private storeOf<T>(type: ComponentType<T>): IComponentStore<T> {
    let store = this.stores.get(type.id);
    if (!store) {
      store = new SparseSetStore<T>();
      this.stores.set(type.id, store);
    }
    return store as IComponentStore<T>;
  }

  /**
   * Get component store for type without creating it
   * 获取类型的组件存储（不创建）
   */
  getStore<T>(type: ComponentType<T>): IComponentStore<T> | undefined {
    return this.stores.get(type.id) as IComponentStore<T> | undefined;
  }

  /**
   * Add component to entity, overwriting an existing one of the same type
   * 向实体添加组件，覆盖同类型的已有组件
   */
  addComponentToEntity<T>(e: Entity, type: ComponentType<T>, c: T): void {
    if (!this.em.isAlive(e)) {
      throw new Error(`Cannot add ${type.ctor.name} to dead entity ${e}`);
    }
    this.storeOf(type).add(e, c);
  }

  /**
   * Remove component from entity
   * 从实体移除组件
   */
  removeComponentFromEntity<T>(e: Entity, type: ComponentType<T>): void {
    this.getStore(type)?.remove(e);
  }

  /**
   * Get component from entity
   * 从实体获取组件
   */
  getEntityComponent<T>(e: Entity, type: ComponentType<T>): T | undefined {
    return this.getStore(type)?.get(e);
  }

  /**
   * Check if entity has component
   * 检查实体是否拥有组件
   */
  entityHasComponent<T>(e: Entity, type: ComponentType<T>): boolean {
    return this.getStore(type)?.has(e) ?? false;
  }

  /**
   * Entities carrying a component of the given type
   * 拥有给定类型组件的实体
   */
  entitiesWith<T>(type: ComponentType<T>): Entity[] {
    return this.getStore(type)?.entities() ?? [];
  }

  /**
   * Add component to entity (convenience method)
   * 向实体添加组件（便捷方法）
   */
  addComponent<T extends object>(e: Entity, ctor: ComponentCtor<T>, data?: Partial<T>): T {
    const component = new ctor();
    if (data) {
      Object.assign(component, data);
    }
    this.addComponentToEntity(e, getComponentType(ctor), component);
    return component;
  }

  /**
   * Attach an existing component instance (convenience method)
   * 挂载现有组件实例（便捷方法）
   */
  setComponent<T extends object>(e: Entity, ctor: ComponentCtor<T>, component: T): void {
    this.addComponentToEntity(e, getComponentType(ctor), component);
  }

  /**
   * Remove component from entity (convenience method)
   * 从实体移除组件（便捷方法）
   */
  removeComponent<T extends object>(e: Entity, ctor: ComponentCtor<T>): void {
    this.removeComponentFromEntity(e, getComponentType(ctor));
  }

  /**
   * Get component from entity (convenience method)
   * 从实体获取组件（便捷方法）
   */
  getComponent<T extends object>(e: Entity, ctor: ComponentCtor<T>): T | undefined {
    return this.getEntityComponent(e, getComponentType(ctor));
  }

  /**
   * Check if entity has component (convenience method)
   * 检查实体是否有组件（便捷方法）
   */
  hasComponent<T extends object>(e: Entity, ctor: ComponentCtor<T>): boolean {
    return this.entityHasComponent(e, getComponentType(ctor));
  }

  /**
   * Destroy every entity and component; handles issued before stay dead
   * 销毁所有实体和组件；之前发出的句柄保持失效
   */
  clear(): void {
    for (const store of this.stores.values()) {
      store.clear();
    }
    this.em.clear();
  }
}
