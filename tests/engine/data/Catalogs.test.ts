import { describe, it, expect } from 'vitest';
import { bundledCombos, parseComboCatalog } from '../../../src/engine/data/ComboCatalog';
import { EnemyCatalog, parseEnemyCatalog } from '../../../src/engine/data/EnemyCatalog';
import { DEFAULT_LOADOUT, WeaponCatalog, parseWeaponCatalog } from '../../../src/engine/data/WeaponCatalog';
import { EnemyFactory } from '../../../src/engine/data/EnemyFactory';

describe('EnemyCatalog', () => {
  it('bundles a default enemy for every gate type', () => {
    const catalog = EnemyCatalog.bundled();
    expect(catalog.defaultForGate('standard')).toMatchObject({ id: 100, baseHealth: 5000, attackPower: 1500 });
    expect(catalog.defaultForGate('elite')).toMatchObject({ id: 101, baseHealth: 8000, attackPower: 2500 });
    expect(catalog.defaultForGate('support')).toMatchObject({ id: 102, primaryAction: 'buffAlly' });
    expect(catalog.defaultForGate('summoner')).toMatchObject({ id: 103, primaryAction: 'summon' });
    expect(catalog.defaultForGate('fortress')).toMatchObject({ id: 104, baseHealth: 12000 });
  });

  it('rejects duplicate ids and malformed entries', () => {
    const entry = {
      id: 1,
      name: 'x',
      category: 'attacker',
      baseHealth: 10,
      attackPower: 1,
      primaryAction: 'attack',
    };
    expect(parseEnemyCatalog([entry])[0].defense).toBe(0);
    expect(() => parseEnemyCatalog([entry, entry])).toThrow('Duplicate enemy id in catalog: 1');
    expect(() => parseEnemyCatalog([{ ...entry, baseHealth: 0 }])).toThrow();
  });
});

describe('WeaponCatalog', () => {
  it('resolves the default loadout', () => {
    const weapons = WeaponCatalog.bundled().loadout(DEFAULT_LOADOUT);
    expect(weapons.map((w) => w.name)).toEqual(DEFAULT_LOADOUT);
  });

  it('bundles only weapons that can hit something', () => {
    const ranges = WeaponCatalog.bundled()
      .all()
      .map((w) => w.range);
    expect(ranges).toHaveLength(7);
    expect(ranges).not.toContain('self');
  });

  it('throws on an unknown weapon name', () => {
    expect(() => WeaponCatalog.bundled().loadout(['Nope'])).toThrow('Unknown weapon: Nope');
  });

  it('applies defaults and rejects unknown ranges', () => {
    const [weapon] = parseWeaponCatalog([
      { name: 'Stick', attribute: 'none', weaponType: 'tool', basePower: 5, range: 'singleFront' },
    ]);
    expect(weapon).toMatchObject({ criticalRate: 0, cooldownTurns: 0, canUseConsecutively: true });
    expect(() =>
      parseWeaponCatalog([{ name: 'Bad', attribute: 'none', weaponType: 'tool', basePower: 5, range: 'cone' }])
    ).toThrow();
  });
});

describe('ComboCatalog', () => {
  it('parses the bundled combos', () => {
    const combos = bundledCombos();
    expect(combos.length).toBeGreaterThan(0);
    expect(combos.find((c) => c.name === 'Fire Chain')?.steps).toHaveLength(2);
  });

  it('rejects a step without requirements and duplicate names', () => {
    expect(() => parseComboCatalog([{ name: 'Empty', steps: [{}], effects: [] }])).toThrow();
    const combo = { name: 'Twice', steps: [{ attribute: 'fire' }], effects: [] };
    expect(() => parseComboCatalog([combo, combo])).toThrow('Duplicate combo in catalog: Twice');
  });
});

describe('EnemyFactory', () => {
  it('numbers instances per factory', () => {
    const data = EnemyCatalog.bundled().defaultForGate('standard');
    if (!data) throw new Error('missing template');
    const factory = new EnemyFactory();

    expect(factory.create(data, 0).instanceId).toBe('enemy_1');
    expect(factory.create(data, 2).instanceId).toBe('enemy_2');
    expect(new EnemyFactory().create(data, 0).instanceId).toBe('enemy_1');

    factory.reset();
    expect(factory.create(data, 0).instanceId).toBe('enemy_1');
  });
});
