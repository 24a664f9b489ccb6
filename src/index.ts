/**
 * ecs-saveload - Selective persistence for Entity Component System worlds
 * 实体组件系统世界的选择性持久化
 *
 * @packageDocumentation
 */

// Entity handles
export type { Entity, ComponentCtor, ComponentType } from './utils/Types';
export { makeEntity, indexOf, genOf, isValidEntity, MAX_ENTITY_INDEX, MAX_GENERATION } from './utils/Types';

// Reference ECS
export { World } from './core/World';
export { EntityManager } from './core/EntityManager';
export { SparseSetStore } from './core/SparseSetStore';
export type { IComponentStore } from './core/SparseSetStore';
export {
  getComponentType,
  registerComponent,
  getCtorByTypeId,
  __resetRegistry
} from './core/ComponentRegistry';

// Save/load
export * from './saveload';
