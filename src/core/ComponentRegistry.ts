/**
 * Component type registration with bidirectional mapping (ctor ↔ id)
 * 组件类型注册，支持双向映射（构造函数 ↔ ID）
 */

import type { ComponentCtor, ComponentType } from '../utils/Types';

export type { ComponentCtor, ComponentType } from '../utils/Types';

let _nextTypeId = 1; // 0 reserved 0被预留
const _idByCtor = new Map<ComponentCtor<object>, number>();
const _ctorById = new Map<number, ComponentCtor<object>>();

/**
 * Register component with optional explicit ID for hot reload/toolchain stability
 * 注册组件，可显式指定ID，用于热重载/工具链保证稳定ID
 */
export function registerComponent<T extends object>(
  ctor: ComponentCtor<T>,
  explicitId?: number
): ComponentType<T> {
  const existing = _idByCtor.get(ctor);
  if (existing !== undefined) {
    return { id: existing, ctor };
  }

  const id = explicitId ?? _nextTypeId++;
  const occupant = _ctorById.get(id);
  if (occupant) {
    throw new Error(
      `[ComponentTypeRegistry] id ${id} already occupied by ${occupant.name}`
    );
  }
  if (id >= _nextTypeId) {
    _nextTypeId = id + 1;
  }

  _idByCtor.set(ctor, id);
  _ctorById.set(id, ctor);
  return { id, ctor };
}

/**
 * Get component type (auto-register if not registered)
 * 获取组件类型（若未注册则自动注册并分配ID）
 */
export function getComponentType<T extends object>(ctor: ComponentCtor<T>): ComponentType<T> {
  const id = _idByCtor.get(ctor);
  return id !== undefined ? { id, ctor } : registerComponent(ctor);
}

/**
 * Get constructor by type ID
 * 通过ID取回构造函数
 */
export function getCtorByTypeId(id: number): ComponentCtor<object> | undefined {
  return _ctorById.get(id);
}

/**
 * Reset registry (for testing)
 * 重置注册表（测试用）
 */
export function __resetRegistry(): void {
  _nextTypeId = 1;
  _idByCtor.clear();
  _ctorById.clear();
}
