/**
 * World persistence facade
 * 世界持久化门面
 */

import { World } from '../core/World';
import type { ComponentCtor, Entity } from '../utils/Types';
import {
  SAVE_STREAM_FORMAT,
  StreamFormat,
  type ComponentSerde,
  type LoadResult,
  type PersistableWorld,
  type PersistenceOptions,
  type SaveStream,
  type TypeBlock
} from './Types';
import { MarkerRegistry, SerializeMe } from './Marker';
import { LoadTranslator, SaveTranslator } from './EntityTranslator';
import { PersistentTypeRegistry, type PersistentType } from './PersistentTypeRegistry';
import { runLoad, runSave } from './TypeVisitationDriver';
import { copyStream, decodeStream, encodeStream, type EncodedStream } from './StreamCodec';
import { UnsupportedTypeError } from './Errors';

/**
 * Default persistence options
 * 默认持久化配置
 */
export const DEFAULT_PERSISTENCE_OPTIONS: PersistenceOptions = {
  marker: SerializeMe,
  format: StreamFormat.JSON,
  prettyPrint: false,
  restoreMarkers: true,
  clearWorld: false,
  strict: false,
  verbose: false,
  logger: console
};

/**
 * Saves and loads the marked subset of a world
 * 存档与读档世界中被标记的子集
 *
 * @example
 * ```typescript
 * const persistence = new WorldPersistence({ format: StreamFormat.Binary });
 * persistence
 *   .register(Position)
 *   .register(Target, { mapEntities: entityFields<Target>({ ref: 'one' }) });
 *
 * persistence.mark(world, a);
 * persistence.mark(world, b);
 * const bytes = persistence.saveEncoded(world, [Position, Target]);
 *
 * const { world: restored } = persistence.restore(persistence.decode(bytes), [Position, Target]);
 * ```
 */
export class WorldPersistence {
  readonly options: PersistenceOptions;
  readonly types = new PersistentTypeRegistry();
  readonly markers: MarkerRegistry<object>;

  constructor(options: Partial<PersistenceOptions> = {}) {
    this.options = { ...DEFAULT_PERSISTENCE_OPTIONS, ...options };
    this.markers = new MarkerRegistry(this.options.marker);
  }

  /**
   * Register a component type for persistence
   * 注册需持久化的组件类型
   */
  register<T extends object>(ctor: ComponentCtor<T>, serde?: ComponentSerde<T>): this {
    this.types.register(ctor, serde);
    return this;
  }

  /**
   * Flag an entity for persistence
   * 标记实体需持久化
   */
  mark(world: PersistableWorld, entity: Entity): void {
    this.markers.mark(world, entity);
  }

  isMarked(world: PersistableWorld, entity: Entity): boolean {
    return this.markers.isMarked(world, entity);
  }

  /**
   * Serialize the marked entities' components of the listed types
   * 序列化被标记实体上所列类型的组件
   */
  save(world: PersistableWorld, types: readonly ComponentCtor<object>[]): SaveStream {
    const resolved = this.types.resolve(types);
    const translator = SaveTranslator.begin(this.markers.collect(world));
    const blocks = runSave(resolved, translator, world);

    if (this.options.verbose) {
      const records = blocks.reduce((sum, block) => sum + block.records.length, 0);
      this.options.logger.debug(
        `[WorldPersistence] saved ${translator.size} entities, ${records} records in ${blocks.length} blocks`
      );
    }

    return { format: SAVE_STREAM_FORMAT, entityCount: translator.size, blocks };
  }

  /**
   * Load a stream into `world`, allocating fresh entities for its ordinals
   * 将数据流读入 `world`，为其序号分配新实体
   */
  load(world: PersistableWorld, stream: SaveStream, types: readonly ComponentCtor<object>[]): LoadResult {
    return this.loadInto(world, types, this.options.clearWorld, () => copyStream(stream));
  }

  /**
   * Load a stream into a new, empty world
   * 将数据流读入一个新的空世界
   */
  restore(stream: SaveStream, types: readonly ComponentCtor<object>[]): { world: World; result: LoadResult } {
    const world = new World();
    const result = this.loadInto(world, types, false, () => copyStream(stream));
    return { world, result };
  }

  /**
   * Encode a stream with the configured format
   * 以配置的格式编码数据流
   */
  encode(stream: SaveStream): EncodedStream {
    return encodeStream(stream, { format: this.options.format, prettyPrint: this.options.prettyPrint });
  }

  decode(data: EncodedStream): SaveStream {
    return decodeStream(data);
  }

  saveEncoded(world: PersistableWorld, types: readonly ComponentCtor<object>[]): EncodedStream {
    return this.encode(this.save(world, types));
  }

  loadEncoded(world: PersistableWorld, data: EncodedStream, types: readonly ComponentCtor<object>[]): LoadResult {
    return this.loadInto(world, types, this.options.clearWorld, () => this.decode(data));
  }

  /**
   * @param readStream yields a validated stream that shares nothing with the caller's
   * 返回经校验且不与调用方共享数据的数据流
   */
  private loadInto(
    world: PersistableWorld,
    types: readonly ComponentCtor<object>[],
    clearWorld: boolean,
    readStream: () => SaveStream
  ): LoadResult {
    const resolved = this.types.resolve(types);
    const checked = readStream();
    const { blocks, skippedBlocks } = this.indexBlocks(checked, resolved);

    if (clearWorld) {
      if (!world.clear) {
        throw new Error('clearWorld requires a world that implements clear()');
      }
      world.clear();
    }

    // Allocate in ordinal order so a fresh world saves back to the same ordinals,
    // and so marked entities without listed components come back too
    // 按序号顺序分配，使新世界再次存档得到相同序号，且无所列组件的被标记实体也会恢复
    const translator = new LoadTranslator(() => world.createEntity(), checked.entityCount);
    translator.allocateAll();
    const components = runLoad(resolved, blocks, translator, world);
    const entities = translator.entries();

    if (this.options.restoreMarkers) {
      for (const entity of entities.values()) {
        this.markers.mark(world, entity);
      }
    }

    if (this.options.verbose) {
      this.options.logger.debug(
        `[WorldPersistence] loaded ${entities.size} entities, ${components} components` +
        (skippedBlocks.length > 0 ? `, skipped ${skippedBlocks.join(', ')}` : '')
      );
    }

    return { entities, components, skippedBlocks };
  }

  /**
   * Key stream blocks by tag; blocks no listed type claims are skipped or rejected
   * 按标签索引数据流块；没有对应类型的块被跳过或拒绝
   */
  private indexBlocks(
    stream: SaveStream,
    types: readonly PersistentType[]
  ): { blocks: Map<string, TypeBlock>; skippedBlocks: string[] } {
    const listed = new Set(types.map(type => type.tag));
    const blocks = new Map<string, TypeBlock>();
    const skippedBlocks: string[] = [];

    for (const block of stream.blocks) {
      if (listed.has(block.type)) {
        blocks.set(block.type, block);
        continue;
      }
      if (this.options.strict) {
        throw new UnsupportedTypeError(`Stream block "${block.type}" has no matching type in the type list`, block.type);
      }
      this.options.logger.warn(
        `[WorldPersistence] skipping block "${block.type}" (${block.records.length} records): type not in the type list`
      );
      skippedBlocks.push(block.type);
    }

    return { blocks, skippedBlocks };
  }
}
