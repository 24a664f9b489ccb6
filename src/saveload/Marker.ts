/**
 * Persistence markers
 * 持久化标记
 */

import { getComponentType } from '../core/ComponentRegistry';
import { indexOf } from '../utils/Types';
import type { ComponentCtor, ComponentType, Entity } from '../utils/Types';
import type { PersistableWorld } from './Types';

/**
 * Default marker component: entities carrying it are saved
 * 默认标记组件：拥有它的实体会被存档
 */
export class SerializeMe {}

/**
 * Selects the entities flagged for persistence
 * 选出被标记为需持久化的实体
 *
 * @example
 * ```typescript
 * const markers = new MarkerRegistry(SerializeMe);
 * markers.mark(world, player);
 * markers.collect(world); // [player]
 * ```
 */
export class MarkerRegistry<M extends object = SerializeMe> {
  readonly type: ComponentType<M>;

  constructor(readonly marker: ComponentCtor<M>) {
    this.type = getComponentType(marker);
  }

  /**
   * Every marked entity in ascending slot order, read fresh from the world
   * 按槽位升序返回所有被标记的实体，每次都从世界读取
   */
  collect(world: PersistableWorld): Entity[] {
    return [...world.entitiesWith(this.type)].sort((a, b) => indexOf(a) - indexOf(b));
  }

  mark(world: PersistableWorld, entity: Entity): void {
    if (!world.entityHasComponent(entity, this.type)) {
      world.addComponentToEntity(entity, this.type, new this.marker());
    }
  }

  isMarked(world: PersistableWorld, entity: Entity): boolean {
    return world.entityHasComponent(entity, this.type);
  }
}
