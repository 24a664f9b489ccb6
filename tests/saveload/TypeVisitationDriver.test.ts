/**
 * Tests for type visitation and the per-type visitors
 * 类型访问与按类型访问器测试
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { World } from '../../src/core/World';
import { PersistentTypeRegistry } from '../../src/saveload/PersistentTypeRegistry';
import { SaveTranslator, LoadTranslator } from '../../src/saveload/EntityTranslator';
import { runSave, runLoad } from '../../src/saveload/TypeVisitationDriver';
import { entityFields } from '../../src/saveload/EntityRefs';
import { EncodingError, UnknownEntityError } from '../../src/saveload/Errors';
import type { TypeBlock } from '../../src/saveload/Types';
import type { Entity } from '../../src/utils/Types';

class Position {
  x = 0;
  y = 0;
}

class Target {
  ref: Entity = 0;
}

class Fragile {
  value = 0;
}

class Unused {
  flag = false;
}

function blocksOf(...blocks: TypeBlock[]): Map<string, TypeBlock> {
  return new Map(blocks.map(block => [block.type, block]));
}

describe('TypeVisitationDriver', () => {
  let registry: PersistentTypeRegistry;
  let world: World;

  beforeEach(() => {
    registry = new PersistentTypeRegistry();
    registry.register(Position);
    registry.register(Target, { mapEntities: entityFields<Target>({ ref: 'one' }) });
    registry.register(Unused);
    registry.register(Fragile, {
      serialize: () => {
        throw new Error('boom');
      },
      deserialize: () => {
        throw new Error('bad payload');
      }
    });
    world = new World();
  });

  describe('runSave', () => {
    test('should emit one block per type, in list order', () => {
      const a = world.createEntity();
      world.addComponent(a, Position, { x: 1, y: 1 });

      const blocks = runSave(registry.resolve([Unused, Position]), SaveTranslator.begin([a]), world);

      expect(blocks).toEqual([
        { type: 'Unused', records: [] },
        { type: 'Position', records: [[0, { x: 1, y: 1 }]] }
      ]);
    });

    test('should only visit translated entities, in translator order', () => {
      const a = world.createEntity();
      const b = world.createEntity();
      const outsider = world.createEntity();
      world.addComponent(a, Position, { x: 1 });
      world.addComponent(b, Position, { x: 2 });
      world.addComponent(outsider, Position, { x: 3 });

      const [block] = runSave(registry.resolve([Position]), SaveTranslator.begin([b, a]), world);

      expect(block.records).toEqual([
        [0, { x: 2, y: 0 }],
        [1, { x: 1, y: 0 }]
      ]);
    });

    test('should rewrite references to ordinals', () => {
      const a = world.createEntity();
      const b = world.createEntity();
      world.addComponent(b, Target, { ref: a });

      const [block] = runSave(registry.resolve([Target]), SaveTranslator.begin([a, b]), world);

      expect(block.records).toEqual([[1, { ref: 0 }]]);
      expect(world.getComponent(b, Target)?.ref).toBe(a);
    });

    test('should let UnknownEntity through unwrapped', () => {
      const a = world.createEntity();
      const b = world.createEntity();
      world.addComponent(b, Target, { ref: a });

      expect(() => runSave(registry.resolve([Target]), SaveTranslator.begin([b]), world)).toThrow(UnknownEntityError);
    });

    test('should wrap serializer failures as EncodingError with the cause', () => {
      const e = world.createEntity();
      world.addComponent(e, Fragile);

      try {
        runSave(registry.resolve([Fragile]), SaveTranslator.begin([e]), world);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(EncodingError);
        if (error instanceof EncodingError) {
          expect(error.message).toBe('Failed to serialize Fragile of entity 1: boom');
          expect(error.cause).toBeInstanceOf(Error);
        }
      }
    });
  });

  describe('runLoad', () => {
    test('should attach components and converge forward references', () => {
      const translator = new LoadTranslator(() => world.createEntity(), 2);

      const attached = runLoad(
        registry.resolve([Target, Position]),
        blocksOf(
          { type: 'Target', records: [[0, { ref: 1 }]] },
          { type: 'Position', records: [[1, { x: 4, y: 5 }]] }
        ),
        translator,
        world
      );

      const first = translator.toLive(0);
      const second = translator.toLive(1);

      expect(attached).toBe(2);
      expect(world.getComponent(first, Target)?.ref).toBe(second);
      expect(world.getComponent(second, Position)).toEqual({ x: 4, y: 5 });
      expect(world.getComponent(second, Position)).toBeInstanceOf(Position);
      expect(world.aliveCount()).toBe(2);
    });

    test('a type without a block should attach nothing', () => {
      const translator = new LoadTranslator(() => world.createEntity(), 1);

      const attached = runLoad(
        registry.resolve([Position, Unused]),
        blocksOf({ type: 'Unused', records: [] }),
        translator,
        world
      );

      expect(attached).toBe(0);
      expect(world.aliveCount()).toBe(0);
    });

    test('should reject an ordinal repeated within a block', () => {
      const translator = new LoadTranslator(() => world.createEntity(), 1);

      expect(() =>
        runLoad(
          registry.resolve([Position]),
          blocksOf({ type: 'Position', records: [[0, { x: 1 }], [0, { x: 2 }]] }),
          translator,
          world
        )
      ).toThrow('Ordinal 0 appears twice in block "Position"');
    });

    test('should wrap deserializer failures as EncodingError', () => {
      const translator = new LoadTranslator(() => world.createEntity(), 1);

      expect(() =>
        runLoad(
          registry.resolve([Fragile]),
          blocksOf({ type: 'Fragile', records: [[0, { value: 1 }]] }),
          translator,
          world
        )
      ).toThrow('Failed to deserialize Fragile for ordinal 0: bad payload');
    });
  });
});
