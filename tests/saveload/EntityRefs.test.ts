/**
 * Tests for entity reference mapping
 * 实体引用映射测试
 */

import { describe, test, expect } from 'vitest';
import {
  entityFields,
  mapOptional,
  mapList,
  cloneComponent,
  toWire,
  fromWire
} from '../../src/saveload/EntityRefs';
import { SaveTranslator, LoadTranslator } from '../../src/saveload/EntityTranslator';
import { EncodingError, UnknownEntityError } from '../../src/saveload/Errors';
import type { Entity } from '../../src/utils/Types';

class Target {
  ref: Entity = 0;
}

class Squad {
  name = '';
  leader: Entity = 0;
  medic: Entity | null = null;
  members: Entity[] = [];
}

const plusTen = (e: Entity) => e + 10;

describe('mapOptional / mapList', () => {
  test('should pass null and undefined through', () => {
    expect(mapOptional(null, plusTen)).toBeNull();
    expect(mapOptional(undefined, plusTen)).toBeUndefined();
    expect(mapOptional(3, plusTen)).toBe(13);
  });

  test('should map lists into a new array', () => {
    const input = [1, 2];
    const output = mapList(input, plusTen);

    expect(output).toEqual([11, 12]);
    expect(output).not.toBe(input);
  });
});

describe('cloneComponent', () => {
  test('should keep the prototype and copy own fields', () => {
    const original = Object.assign(new Target(), { ref: 4 });
    const copy = cloneComponent(original);

    expect(copy).toBeInstanceOf(Target);
    expect(copy).not.toBe(original);
    expect(copy.ref).toBe(4);
  });
});

describe('entityFields', () => {
  const mapSquad = entityFields<Squad>({ leader: 'one', medic: 'optional', members: 'many' });

  test('should map every declared field and leave others alone', () => {
    const squad = Object.assign(new Squad(), { name: 'red', leader: 1, medic: 2, members: [1, 3] });

    const mapped = mapSquad(squad, plusTen);

    expect(mapped).toBeInstanceOf(Squad);
    expect(mapped.name).toBe('red');
    expect(mapped.leader).toBe(11);
    expect(mapped.medic).toBe(12);
    expect(mapped.members).toEqual([11, 13]);
  });

  test('should not touch the input component', () => {
    const squad = Object.assign(new Squad(), { leader: 1, members: [1, 3] });

    mapSquad(squad, plusTen);

    expect(squad.leader).toBe(1);
    expect(squad.members).toEqual([1, 3]);
  });

  test('should keep an empty optional reference empty', () => {
    const squad = Object.assign(new Squad(), { leader: 1 });
    expect(mapSquad(squad, plusTen).medic).toBeNull();
  });

  test('should reject a field of the wrong shape', () => {
    const target = new Target();
    Reflect.set(target, 'ref', 'nobody');

    const mapTarget = entityFields<Target>({ ref: 'one' });

    expect(() => mapTarget(target, plusTen)).toThrow(EncodingError);
    expect(() => mapTarget(target, plusTen)).toThrow('Target.ref: expected one entity reference, got string');
  });

  test('should reject a list holding a non-entity', () => {
    const squad = new Squad();
    Reflect.set(squad, 'members', [1, null]);

    expect(() => mapSquad(squad, plusTen)).toThrow('Squad.members: expected many entity reference, got object');
  });
});

describe('toWire / fromWire', () => {
  const mapTarget = entityFields<Target>({ ref: 'one' });

  test('should rewrite live entities to ordinals', () => {
    const translator = SaveTranslator.begin([7, 3]);
    const wire = toWire(Object.assign(new Target(), { ref: 3 }), mapTarget, translator);

    expect(wire.ref).toBe(1);
  });

  test('should fail for a reference outside the translator', () => {
    const translator = SaveTranslator.begin([7]);

    expect(() => toWire(Object.assign(new Target(), { ref: 3 }), mapTarget, translator)).toThrow(UnknownEntityError);
  });

  test('should rewrite ordinals to live entities, allocating as needed', () => {
    let next = 50;
    const translator = new LoadTranslator(() => next++, 4);
    const live = fromWire(Object.assign(new Target(), { ref: 2 }), mapTarget, translator);

    expect(live.ref).toBe(50);
    expect(translator.toLive(2)).toBe(50);
  });

  test('should return the component as-is without a capability', () => {
    const target = new Target();
    expect(toWire(target, undefined, SaveTranslator.begin([]))).toBe(target);
  });
});
