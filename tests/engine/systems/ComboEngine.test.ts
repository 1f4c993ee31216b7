import { describe, it, expect, vi } from 'vitest';
import { ComboEngine, type WeaponUse } from '../../../src/engine/systems/ComboEngine';
import type { ComboDefinition, WeaponData } from '../../../src/engine/types';
import { testWeapon } from '../testContext';

const fireSword = testWeapon({ name: 'Fire Sword', attribute: 'fire', weaponType: 'sword' });
const iceSpear = testWeapon({ name: 'Ice Spear', attribute: 'ice', weaponType: 'spear' });
const windAxe = testWeapon({ name: 'Wind Axe', attribute: 'wind', weaponType: 'axe' });

function use(weapon: WeaponData, weaponIndex: number, turn = 1, attackPower = 200): WeaponUse {
  return { weapon, weaponIndex, attackPower, turn };
}

const fireChain: ComboDefinition = {
  name: 'Fire Chain',
  steps: [{ attribute: 'fire' }, { attribute: 'fire' }],
  effects: [{ type: 'damageMultiplier', value: 1.5 }],
  maxTurnInterval: 2,
  priority: 1,
};

const clash: ComboDefinition = {
  name: 'Clash',
  steps: [{ attribute: 'fire' }, { attribute: 'ice' }],
  effects: [
    { type: 'damageMultiplier', value: 1.2 },
    { type: 'additionalAction', value: 1 },
  ],
  maxTurnInterval: 0,
  priority: 0,
};

describe('ComboEngine', () => {
  it('starts, progresses and completes a combo', () => {
    const notify = vi.fn();
    const engine = new ComboEngine([fireChain], { maxActiveCombos: 5, notify });

    expect(engine.processWeaponUse(use(fireSword, 0), false).damageMultiplier).toBe(1);
    expect(engine.getProgress()[0]).toMatchObject({ status: 'inProgress', stepsDone: 1, startTurn: 1 });

    const outcome = engine.processWeaponUse(use(fireSword, 0), false);
    expect(outcome).toEqual({ completedCombos: ['Fire Chain'], damageMultiplier: 1.5, bonusActions: 0, healing: 0 });
    expect(engine.getProgress()[0].status).toBe('notStarted');
    expect(notify.mock.calls.map((c) => c[0])).toEqual(['ComboStarted', 'ComboCompleted']);
  });

  it('leaves combos untouched on a non-matching use', () => {
    const engine = new ComboEngine([fireChain], { maxActiveCombos: 5 });
    engine.processWeaponUse(use(fireSword, 0), false);
    engine.processWeaponUse(use(windAxe, 1), false);

    expect(engine.getProgress()[0]).toMatchObject({ status: 'inProgress', stepsDone: 1 });
  });

  it('previews without mutating and matches the committed outcome', () => {
    const notify = vi.fn();
    const engine = new ComboEngine([fireChain, clash], { maxActiveCombos: 5, notify });
    engine.processWeaponUse(use(fireSword, 0), false);
    notify.mockClear();
    const before = engine.getProgress();

    const preview = engine.processWeaponUse(use(iceSpear, 1), true);
    expect(engine.getProgress()).toEqual(before);
    expect(notify).not.toHaveBeenCalled();

    const committed = engine.processWeaponUse(use(iceSpear, 1), false);
    expect(committed).toEqual(preview);
    expect(committed).toEqual({ completedCombos: ['Clash'], damageMultiplier: 1.2, bonusActions: 1, healing: 0 });
  });

  it('reports the highest multiplier and sums bonuses when several complete', () => {
    const extra: ComboDefinition = {
      name: 'Twin Flame',
      steps: [{ weaponType: 'sword' }, { attribute: 'fire' }],
      effects: [
        { type: 'damageMultiplier', value: 1.1 },
        { type: 'additionalAction', value: 2 },
        { type: 'healing', value: 300 },
      ],
      maxTurnInterval: 0,
      priority: 5,
    };
    const engine = new ComboEngine([extra, fireChain], { maxActiveCombos: 5 });
    engine.processWeaponUse(use(fireSword, 0), false);

    const outcome = engine.processWeaponUse(use(fireSword, 0), false);
    expect(outcome).toEqual({
      completedCombos: ['Twin Flame', 'Fire Chain'],
      damageMultiplier: 1.5,
      bonusActions: 2,
      healing: 300,
    });
    expect(engine.activeCount()).toBe(0);
  });

  it('breaks multiplier ties by priority', () => {
    const low: ComboDefinition = { ...fireChain, name: 'Low', priority: 0 };
    const high: ComboDefinition = { ...fireChain, name: 'High', priority: 9, effects: [{ type: 'damageMultiplier', value: 1.5 }, { type: 'healing', value: 1 }] };
    const engine = new ComboEngine([low, high], { maxActiveCombos: 5 });
    engine.processWeaponUse(use(fireSword, 0), false);

    const outcome = engine.processWeaponUse(use(fireSword, 0), false);
    expect(outcome.damageMultiplier).toBe(1.5);
    expect(outcome.completedCombos).toEqual(['Low', 'High']);
    expect(outcome.healing).toBe(1);
  });

  it('respects the active combo limit', () => {
    const engine = new ComboEngine([fireChain, clash], { maxActiveCombos: 1 });
    engine.processWeaponUse(use(fireSword, 0), false);

    expect(engine.getProgress().map((p) => p.status)).toEqual(['inProgress', 'notStarted']);
  });

  it('checks weapon index and minimum power', () => {
    const gated: ComboDefinition = {
      name: 'Gated',
      steps: [{ weaponIndex: 2 }, { minPower: 250 }],
      effects: [{ type: 'damageMultiplier', value: 2 }],
      maxTurnInterval: 0,
      priority: 0,
    };
    const engine = new ComboEngine([gated], { maxActiveCombos: 5 });

    engine.processWeaponUse(use(fireSword, 1), false);
    expect(engine.activeCount()).toBe(0);
    engine.processWeaponUse(use(fireSword, 2), false);
    expect(engine.processWeaponUse(use(fireSword, 0, 1, 200), false).damageMultiplier).toBe(1);
    expect(engine.processWeaponUse(use(fireSword, 0, 1, 250), false).damageMultiplier).toBe(2);
  });

  it('expires combos that exceed their turn window', () => {
    const notify = vi.fn();
    const engine = new ComboEngine([fireChain, clash], { maxActiveCombos: 5, notify });
    engine.processWeaponUse(use(fireSword, 0, 1), false);

    expect(engine.expireStale(3)).toEqual([]);
    expect(engine.expireStale(4)).toEqual(['Fire Chain']);
    expect(engine.getProgress().map((p) => p.status)).toEqual(['notStarted', 'inProgress']);
    expect(notify).toHaveBeenLastCalledWith('ComboExpired', { combo: 'Fire Chain' });
  });
});
