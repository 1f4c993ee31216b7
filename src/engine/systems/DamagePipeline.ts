import type { BattleContext } from '../core/BattleContext';
import type { EnemyInstance } from '../field/EnemyInstance';
import type { Gate } from '../field/Gate';
import { formatPosition } from '../field/GridPosition';
import {
  reject,
  type CardData,
  type ComboOutcome,
  type DamageBreakdown,
  type Outcome,
  type PendingDamageInfo,
  type TargetSelection,
} from '../types';
import { roundHalfAwayFromZero } from '../utils/rounding';
import type { ComboEngine } from './ComboEngine';

export interface ResolvedTargets {
  enemies: EnemyInstance[];
  gates: Gate[];
}

/** Extra multiplier applied on top of combos, e.g. a difficulty setting. */
export type DamageModifier = (card: CardData, ctx: BattleContext) => number;

export interface DamageComputation {
  breakdown: DamageBreakdown;
  combo: ComboOutcome;
}

export interface CommittedDamage {
  pending: PendingDamageInfo;
  combo: ComboOutcome;
}

export interface AppliedDamage {
  damageDealt: number;
  targetsHit: number;
  enemiesDefeated: number;
  gatesDestroyed: number;
}

export class DamagePipeline {
  private modifiers: Map<string, DamageModifier> = new Map();

  constructor(
    private readonly ctx: BattleContext,
    private readonly combos: ComboEngine
  ) {}

  addModifier(name: string, modifier: DamageModifier): void {
    this.modifiers.set(name, modifier);
  }

  removeModifier(name: string): boolean {
    return this.modifiers.delete(name);
  }

  otherMultiplier(card: CardData): number {
    let multiplier = 1;
    for (const modifier of this.modifiers.values()) {
      multiplier *= modifier(card, this.ctx);
    }
    return multiplier;
  }

  baseDamage(card: CardData): number {
    return this.ctx.player.baseAttackPower + card.weapon.basePower;
  }

  /**
   * One critical roll for a card: the base chance plus the weapon's rate.
   * No dice are drawn when the chance is zero.
   */
  rollCritical(card: CardData): boolean {
    const chance = this.ctx.config.baseCriticalChance + card.weapon.criticalRate / 100;
    if (chance <= 0) return false;
    return this.ctx.dice.chance(chance);
  }

  /**
   * base × combo × other, rounded half away from zero, then the critical
   * multiplier on that result. `simulateCombo` decides whether combo progress
   * is only previewed or committed.
   */
  computeDamage(card: CardData, simulateCombo: boolean, critical = false): DamageComputation {
    const base = this.baseDamage(card);
    const combo = this.combos.processWeaponUse(
      {
        weapon: card.weapon,
        weaponIndex: card.weaponIndex,
        attackPower: base,
        turn: this.ctx.getTurn(),
      },
      simulateCombo
    );
    const other = this.otherMultiplier(card);
    const criticalMultiplier = critical ? this.ctx.config.criticalMultiplier : 1;
    const uncritical = roundHalfAwayFromZero(base * combo.damageMultiplier * other);

    return {
      breakdown: {
        baseDamage: base,
        comboMultiplier: combo.damageMultiplier,
        comboDamage: roundHalfAwayFromZero(base * combo.damageMultiplier) - base,
        otherMultiplier: other,
        otherDamage: roundHalfAwayFromZero(base * other) - base,
        finalDamage: critical ? roundHalfAwayFromZero(uncritical * criticalMultiplier) : uncritical,
        critical,
        criticalMultiplier,
      },
      combo,
    };
  }

  resolveTargets(card: CardData, selection: TargetSelection): ResolvedTargets {
    const { field } = this.ctx;
    const column = card.targetColumn;

    switch (card.weapon.range) {
      case 'self':
        return { enemies: [], gates: [] };
      case 'all':
        return { enemies: field.allEnemies(), gates: [] };
      case 'row1':
        return { enemies: field.enemiesInRow(0), gates: [] };
      case 'row2':
        return { enemies: field.enemiesInRow(1), gates: [] };
      case 'column': {
        // Pierces: the gate is hit even with enemies in front of it
        const gate = field.gateInColumn(column);
        return {
          enemies: field.enemiesInColumn(column),
          gates: gate && !gate.isDestroyed() ? [gate] : [],
        };
      }
      case 'singleTarget':
        if (selection.kind === 'enemy') {
          const selected = field.enemyAt(selection.position);
          if (selected?.isAlive()) {
            return { enemies: [selected], gates: [] };
          }
        }
        return this.frontTarget(column);
      case 'singleFront':
        return this.frontTarget(column);
    }
  }

  preview(
    card: CardData,
    slotIndex: number,
    selection: TargetSelection,
    critical = false
  ): Outcome<PendingDamageInfo> {
    const resolved = this.resolveNonEmpty(card, selection);
    if (!resolved.ok) return resolved;

    const { breakdown } = this.computeDamage(card, true, critical);
    return { ok: true, value: this.buildPending(card, slotIndex, breakdown, resolved.value, true) };
  }

  /** Commits combo progress. Targets are resolved first so a rejection changes nothing. */
  commit(
    card: CardData,
    slotIndex: number,
    selection: TargetSelection,
    critical = false
  ): Outcome<CommittedDamage> {
    const resolved = this.resolveNonEmpty(card, selection);
    if (!resolved.ok) return resolved;

    const { breakdown, combo } = this.computeDamage(card, false, critical);
    return {
      ok: true,
      value: { pending: this.buildPending(card, slotIndex, breakdown, resolved.value, false), combo },
    };
  }

  apply(pending: PendingDamageInfo): AppliedDamage {
    const { field, stats } = this.ctx;
    const amount = pending.breakdown.finalDamage;
    const result: AppliedDamage = { damageDealt: 0, targetsHit: 0, enemiesDefeated: 0, gatesDestroyed: 0 };

    for (const snapshot of pending.targetEnemies) {
      const enemy = field.enemyAt(snapshot.position);
      if (!enemy || enemy.instanceId !== snapshot.instanceId || !enemy.isAlive()) continue;

      const dealt = enemy.takeDamage(amount);
      result.damageDealt += dealt;
      result.targetsHit++;
      this.ctx.notify('EnemyDamaged', { enemy: enemy.snapshot(), amount: dealt });

      if (!enemy.isAlive()) {
        const defeated = enemy.snapshot();
        field.removeEnemy(enemy.position);
        result.enemiesDefeated++;
        stats.enemiesDefeated++;
        this.ctx.logger.info(`${enemy.name} defeated at ${formatPosition(defeated.position)}`);
        this.ctx.notify('EnemyDefeated', { enemy: defeated });
      }
    }

    pending.targetGates.forEach((snapshot, i) => {
      const gate = field.gate(snapshot.gateId);
      if (!gate || gate.isDestroyed()) return;

      const { dealt, destroyed } = field.damageGate(gate.column, pending.gateDamage[i] ?? amount);
      result.damageDealt += dealt;
      result.targetsHit++;
      this.ctx.notify('GateDamaged', { gate: gate.snapshot(), amount: dealt });

      if (destroyed) {
        result.gatesDestroyed++;
        stats.gatesDestroyed++;
        stats.destructionRewards += gate.destructionReward;
        this.ctx.logger.info(`${gate.name} destroyed`);
        this.ctx.notify('GateDestroyed', { gate: gate.snapshot(), reward: gate.destructionReward });
      }
    });

    stats.totalDamageDealt += result.damageDealt;
    return result;
  }

  private frontTarget(column: number): ResolvedTargets {
    const front = this.ctx.field.frontEnemyInColumn(column);
    if (front) return { enemies: [front], gates: [] };

    const gate = this.ctx.field.gateInColumn(column);
    if (gate && this.ctx.field.canAttackGate(column)) {
      return { enemies: [], gates: [gate] };
    }
    return { enemies: [], gates: [] };
  }

  private resolveNonEmpty(card: CardData, selection: TargetSelection): Outcome<ResolvedTargets> {
    const resolved = this.resolveTargets(card, selection);
    if (resolved.enemies.length === 0 && resolved.gates.length === 0) {
      return reject('resolutionFailure', 'No valid target');
    }
    return { ok: true, value: resolved };
  }

  private buildPending(
    card: CardData,
    slotIndex: number,
    breakdown: DamageBreakdown,
    targets: ResolvedTargets,
    simulated: boolean
  ): PendingDamageInfo {
    return Object.freeze({
      card,
      slotIndex,
      breakdown,
      targetEnemies: targets.enemies.map((e) => e.snapshot()),
      targetGates: targets.gates.map((g) => g.snapshot()),
      gateDamage: targets.gates.map((g) => g.reducedDamage(breakdown.finalDamage)),
      description: describeDamage(card, breakdown, targets),
      simulated,
    });
  }
}

export function describeDamage(card: CardData, breakdown: DamageBreakdown, targets: ResolvedTargets): string {
  const parts: string[] = [];
  if (targets.enemies.length > 0) {
    parts.push(targets.enemies.length === 1 ? targets.enemies[0].name : `${targets.enemies.length} enemies`);
  }
  for (const gate of targets.gates) {
    parts.push(gate.name);
  }

  let text = `${card.weapon.name} → ${parts.join(' + ')}: ${breakdown.finalDamage} damage`;
  if (breakdown.comboMultiplier !== 1) {
    text += ` (combo x${breakdown.comboMultiplier})`;
  }
  if (breakdown.critical) {
    text += ' (critical)';
  }
  return text;
}
