import { describe, beforeEach, test, expect } from 'vitest';
import {
  registerComponent,
  getComponentType,
  getCtorByTypeId,
  __resetRegistry
} from '../../src/core/ComponentRegistry';

class Position {
  x = 0;
  y = 0;
}

class Velocity {
  dx = 0;
  dy = 0;
}

class Health {
  value = 100;
}

describe('ComponentRegistry', () => {
  beforeEach(() => {
    __resetRegistry();
  });

  test('should assign sequential ids starting at 1', () => {
    expect(registerComponent(Position).id).toBe(1);
    expect(registerComponent(Velocity).id).toBe(2);
  });

  test('should return the same id for a registered constructor', () => {
    const first = registerComponent(Position);
    const second = registerComponent(Position);

    expect(second.id).toBe(first.id);
    expect(second.ctor).toBe(Position);
  });

  test('should honour explicit ids and continue after them', () => {
    expect(registerComponent(Position, 10).id).toBe(10);
    expect(registerComponent(Velocity).id).toBe(11);
  });

  test('should reject an explicit id that is already taken', () => {
    registerComponent(Position, 10);
    expect(() => registerComponent(Health, 10)).toThrow(
      '[ComponentTypeRegistry] id 10 already occupied by Position'
    );
  });

  test('getComponentType should register on first use', () => {
    const type = getComponentType(Health);

    expect(type.id).toBe(1);
    expect(type.ctor).toBe(Health);
    expect(getComponentType(Health).id).toBe(1);
  });

  test('should map ids back to constructors', () => {
    const type = registerComponent(Velocity);

    expect(getCtorByTypeId(type.id)).toBe(Velocity);
    expect(getCtorByTypeId(99)).toBeUndefined();
  });
});
