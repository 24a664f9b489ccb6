/**
 * Type visitation driver - walks the resolved type list once per operation
 * 类型访问驱动器 - 每次操作按解析后的类型列表遍历一次
 *
 * The driver never names a component type. Which entities take part in a
 * block is decided by each type's visitor.
 * 驱动器从不涉及具体组件类型；哪些实体进入某个块由各类型的访问器决定。
 */

import type { PersistableWorld, TypeBlock } from './Types';
import type { LoadTranslator, SaveTranslator } from './EntityTranslator';
import type { PersistentType } from './PersistentTypeRegistry';

/**
 * Visit every type in order, one block per type (possibly empty)
 * 按顺序访问每个类型，每个类型一个块（可能为空）
 */
export function runSave(
  types: readonly PersistentType[],
  translator: SaveTranslator,
  world: PersistableWorld
): TypeBlock[] {
  return types.map(type => type.save(translator, world));
}

/**
 * Visit every type in order, feeding it the block carrying its tag
 * 按顺序访问每个类型，并传入带有其标签的块
 *
 * A type with no block in the stream attaches nothing.
 * 数据流中没有对应块的类型不挂载任何组件。
 *
 * @returns number of components attached 挂载的组件数
 */
export function runLoad(
  types: readonly PersistentType[],
  blocks: ReadonlyMap<string, TypeBlock>,
  translator: LoadTranslator,
  world: PersistableWorld
): number {
  let attached = 0;
  for (const type of types) {
    const block = blocks.get(type.tag);
    if (block === undefined) continue;
    attached += type.load(block.records, translator, world);
  }
  return attached;
}
