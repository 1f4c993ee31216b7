import type { BattleContext } from '../core/BattleContext';
import type { AttackAttribute, ComboDefinition, ComboOutcome, ComboStep, WeaponData, WeaponType } from '../types';

export type ComboStatus = 'notStarted' | 'inProgress' | 'completed' | 'expired';

export interface ComboProgress {
  readonly name: string;
  status: ComboStatus;
  /** Steps matched so far */
  stepsDone: number;
  startTurn: number;
  usedWeaponIndices: number[];
  usedAttributes: AttackAttribute[];
  usedWeaponTypes: WeaponType[];
}

export interface WeaponUse {
  weapon: WeaponData;
  weaponIndex: number;
  /** Player base attack + weapon base power */
  attackPower: number;
  turn: number;
}

type ComboNotice =
  | { type: 'ComboStarted'; combo: string }
  | { type: 'ComboProgressed'; combo: string; step: number; totalSteps: number }
  | { type: 'ComboCompleted'; combo: string; damageMultiplier: number; bonusActions: number; healing: number };

interface ComboTransition {
  progress: ComboProgress[];
  outcome: ComboOutcome;
  notices: ComboNotice[];
}

export const NO_COMBO: ComboOutcome = Object.freeze({
  completedCombos: [],
  damageMultiplier: 1,
  bonusActions: 0,
  healing: 0,
});

function freshProgress(name: string): ComboProgress {
  return {
    name,
    status: 'notStarted',
    stepsDone: 0,
    startTurn: 0,
    usedWeaponIndices: [],
    usedAttributes: [],
    usedWeaponTypes: [],
  };
}

function copyProgress(p: ComboProgress): ComboProgress {
  return {
    ...p,
    usedWeaponIndices: [...p.usedWeaponIndices],
    usedAttributes: [...p.usedAttributes],
    usedWeaponTypes: [...p.usedWeaponTypes],
  };
}

export function stepMatches(step: ComboStep, use: WeaponUse): boolean {
  if (step.weaponIndex !== undefined && step.weaponIndex !== use.weaponIndex) return false;
  if (step.attribute !== undefined && step.attribute !== use.weapon.attribute) return false;
  if (step.weaponType !== undefined && step.weaponType !== use.weapon.weaponType) return false;
  if (step.minPower !== undefined && use.attackPower < step.minPower) return false;
  return true;
}

function effectTotals(combo: ComboDefinition): { multiplier: number; bonusActions: number; healing: number } {
  let multiplier = 1;
  let bonusActions = 0;
  let healing = 0;
  for (const effect of combo.effects) {
    if (effect.type === 'damageMultiplier') multiplier *= effect.value;
    else if (effect.type === 'additionalAction') bonusActions += effect.value;
    else healing += effect.value;
  }
  return { multiplier, bonusActions, healing };
}

/**
 * The single transition both preview and commit go through. Works on copies;
 * the input progress is never touched.
 */
export function evaluateWeaponUse(
  definitions: readonly ComboDefinition[],
  current: readonly ComboProgress[],
  use: WeaponUse,
  maxActiveCombos: number
): ComboTransition {
  const progress = current.map(copyProgress);
  const notices: ComboNotice[] = [];
  const completed: number[] = [];
  let active = progress.filter((p) => p.status === 'inProgress').length;

  definitions.forEach((combo, index) => {
    const state = progress[index];
    const record = () => {
      state.usedWeaponIndices.push(use.weaponIndex);
      state.usedAttributes.push(use.weapon.attribute);
      state.usedWeaponTypes.push(use.weapon.weaponType);
    };

    if (state.status === 'inProgress') {
      const step = combo.steps[state.stepsDone];
      if (!step || !stepMatches(step, use)) return;
      state.stepsDone++;
      record();
    } else {
      const first = combo.steps[0];
      if (!first || !stepMatches(first, use) || active >= maxActiveCombos) return;
      state.status = 'inProgress';
      state.stepsDone = 1;
      state.startTurn = use.turn;
      record();
      active++;
      notices.push({ type: 'ComboStarted', combo: combo.name });
    }

    if (state.stepsDone >= combo.steps.length) {
      state.status = 'completed';
      completed.push(index);
    } else if (state.stepsDone > 1) {
      notices.push({
        type: 'ComboProgressed',
        combo: combo.name,
        step: state.stepsDone,
        totalSteps: combo.steps.length,
      });
    }
  });

  if (completed.length === 0) {
    return { progress, outcome: { ...NO_COMBO, completedCombos: [] }, notices };
  }

  let best = -1;
  let bestMultiplier = 1;
  let bonusActions = 0;
  let healing = 0;

  for (const index of completed) {
    const combo = definitions[index];
    const totals = effectTotals(combo);
    bonusActions += totals.bonusActions;
    healing += totals.healing;
    notices.push({
      type: 'ComboCompleted',
      combo: combo.name,
      damageMultiplier: totals.multiplier,
      bonusActions: totals.bonusActions,
      healing: totals.healing,
    });

    // Highest multiplier wins; ties go to priority, then definition order
    const better =
      best < 0 ||
      totals.multiplier > bestMultiplier ||
      (totals.multiplier === bestMultiplier && combo.priority > definitions[best].priority);
    if (better) {
      best = index;
      bestMultiplier = totals.multiplier;
    }

    progress[index] = freshProgress(combo.name);
  }

  return {
    progress,
    outcome: {
      completedCombos: completed.map((i) => definitions[i].name),
      damageMultiplier: bestMultiplier,
      bonusActions,
      healing,
    },
    notices,
  };
}

export interface ComboEngineOptions {
  maxActiveCombos: number;
  notify?: BattleContext['notify'];
}

export class ComboEngine {
  private readonly definitions: readonly ComboDefinition[];
  private readonly maxActiveCombos: number;
  private readonly notify?: BattleContext['notify'];
  private progress: ComboProgress[];

  constructor(definitions: readonly ComboDefinition[], options: ComboEngineOptions) {
    this.definitions = definitions;
    this.maxActiveCombos = options.maxActiveCombos;
    this.notify = options.notify;
    this.progress = definitions.map((d) => freshProgress(d.name));
  }

  /**
   * Evaluate a weapon use. With `simulate` nothing changes and no events fire;
   * otherwise the transition is committed. Both return the same outcome for
   * the same state.
   */
  processWeaponUse(use: WeaponUse, simulate: boolean): ComboOutcome {
    const transition = evaluateWeaponUse(this.definitions, this.progress, use, this.maxActiveCombos);
    if (simulate) return transition.outcome;

    this.progress = transition.progress;
    for (const notice of transition.notices) {
      this.emitNotice(notice);
    }
    return transition.outcome;
  }

  /** Player turn entry: drop in-progress combos that ran out of time. */
  expireStale(turn: number): string[] {
    const expired: string[] = [];
    this.definitions.forEach((combo, index) => {
      const state = this.progress[index];
      if (state.status !== 'inProgress' || combo.maxTurnInterval <= 0) return;
      if (turn - state.startTurn > combo.maxTurnInterval) {
        state.status = 'expired';
        expired.push(combo.name);
        this.notify?.('ComboExpired', { combo: combo.name });
        this.progress[index] = freshProgress(combo.name);
      }
    });
    return expired;
  }

  getProgress(): ComboProgress[] {
    return this.progress.map(copyProgress);
  }

  activeCount(): number {
    return this.progress.filter((p) => p.status === 'inProgress').length;
  }

  getDefinitions(): readonly ComboDefinition[] {
    return this.definitions;
  }

  reset(): void {
    this.progress = this.definitions.map((d) => freshProgress(d.name));
  }

  private emitNotice(notice: ComboNotice): void {
    if (!this.notify) return;
    switch (notice.type) {
      case 'ComboStarted':
        this.notify('ComboStarted', { combo: notice.combo });
        break;
      case 'ComboProgressed':
        this.notify('ComboProgressed', { combo: notice.combo, step: notice.step, totalSteps: notice.totalSteps });
        break;
      case 'ComboCompleted':
        this.notify('ComboCompleted', {
          combo: notice.combo,
          damageMultiplier: notice.damageMultiplier,
          bonusActions: notice.bonusActions,
          healing: notice.healing,
        });
        break;
    }
  }
}
