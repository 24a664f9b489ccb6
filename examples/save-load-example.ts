import {
  World,
  WorldPersistence,
  StreamFormat,
  entityFields,
  summarizeStream,
  type Entity
} from '../src';

// Define components
class Position {
  x = 0;
  y = 0;
}

class Health {
  current = 100;
  max = 100;
}

class Target {
  ref: Entity = 0;
}

class Squad {
  leader: Entity = 0;
  medic: Entity | null = null;
  members: Entity[] = [];
}

// Transient engine state, never saved
class RenderHandle {
  textureId = -1;
}

const persistence = new WorldPersistence({ format: StreamFormat.JSON, prettyPrint: true });
persistence
  .register(Position)
  .register(Health)
  .register(Target, { mapEntities: entityFields<Target>({ ref: 'one' }) })
  .register(Squad, {
    mapEntities: entityFields<Squad>({ leader: 'one', medic: 'optional', members: 'many' })
  });

const saveTypes = [Position, Health, Target, Squad];

// Build a small world
const world = new World();

const hero = world.createEntity();
world.addComponent(hero, Position, { x: 4, y: 2 });
world.addComponent(hero, Health, { current: 80 });
world.addComponent(hero, RenderHandle, { textureId: 7 });

const goblin = world.createEntity();
world.addComponent(goblin, Position, { x: 9, y: 3 });
world.addComponent(goblin, Target, { ref: hero });

const squad = world.createEntity();
world.addComponent(squad, Squad, { leader: hero, members: [hero, goblin] });

// A particle effect: alive, but not marked, so it is left out
const particle = world.createEntity();
world.addComponent(particle, Position, { x: 0, y: 0 });

for (const entity of [hero, goblin, squad]) {
  persistence.mark(world, entity);
}

// Save
const text = persistence.saveEncoded(world, saveTypes);
console.log('Saved stream:');
console.log(text);

const summary = summarizeStream(persistence.decode(text));
console.log(`\n${summary.entityCount} entities, ${summary.totalRecords} records`);

// Load into a fresh world
const { world: restored, result } = persistence.restore(persistence.decode(text), saveTypes);

console.log(`\nRestored ${result.entities.size} entities with ${result.components} components`);
for (const [ordinal, entity] of result.entities) {
  const position = restored.getComponent(entity, Position);
  const target = restored.getComponent(entity, Target);
  console.log(
    `  #${ordinal} -> entity ${entity}` +
    (position ? ` at (${position.x}, ${position.y})` : '') +
    (target ? ` targeting ${target.ref}` : '') +
    (restored.hasComponent(entity, RenderHandle) ? ' [render handle]' : '')
  );
}
