import type { GateSnapshot, GateSpawnPattern, GateStrategicEffect, GateType } from '../types';
import type { GateTemplate } from '../data/GateTemplates';
import { roundHalfAwayFromZero } from '../utils/rounding';
import { GATE_ROW, gridPosition, type GridPosition } from './GridPosition';

export interface GateOverrides {
  spawnPattern?: GateSpawnPattern;
  summonInterval?: number;
  summonCount?: number;
  allowedEnemyIds?: number[];
  maxHealth?: number;
  strategicEffect?: GateStrategicEffect;
  effectStrength?: number;
}

export class Gate {
  readonly gateId: number;
  readonly gateType: GateType;
  readonly name: string;
  readonly column: number;
  readonly maxHealth: number;
  readonly destructionReward: number;
  readonly hasDestructionBonus: boolean;
  readonly damageTakenMultiplier: number;

  spawnPattern: GateSpawnPattern;
  summonInterval: number;
  summonCount: number;
  allowedEnemyIds: number[];
  lastSummonTurn = -1;
  firstSummonDone = false;

  strategicEffect: GateStrategicEffect;
  effectStrength: number;
  effectActive = true;

  private currentHealth: number;

  constructor(gateId: number, column: number, template: GateTemplate, overrides: GateOverrides = {}) {
    this.gateId = gateId;
    this.column = column;
    this.gateType = template.gateType;
    this.name = `${template.displayName} ${gateId + 1}`;
    this.maxHealth = overrides.maxHealth ?? template.maxHealth;
    this.currentHealth = this.maxHealth;
    this.destructionReward = template.destructionReward;
    this.hasDestructionBonus = template.hasDestructionBonus;
    this.damageTakenMultiplier = template.damageTakenMultiplier;

    this.spawnPattern = overrides.spawnPattern ?? template.spawnPattern;
    this.summonInterval = overrides.summonInterval ?? template.summonInterval;
    this.summonCount = overrides.summonCount ?? template.summonCount;
    this.allowedEnemyIds = [...(overrides.allowedEnemyIds ?? template.allowedEnemyIds)];
    this.strategicEffect = overrides.strategicEffect ?? template.strategicEffect;
    this.effectStrength = overrides.effectStrength ?? template.effectStrength;
  }

  get health(): number {
    return this.currentHealth;
  }

  get position(): GridPosition {
    return gridPosition(this.column, GATE_ROW);
  }

  isDestroyed(): boolean {
    return this.currentHealth <= 0;
  }

  healthRatio(): number {
    return this.maxHealth > 0 ? this.currentHealth / this.maxHealth : 0;
  }

  /** Card damage after this gate type's reduction (Fortress halves, Elite takes 80%). */
  reducedDamage(amount: number): number {
    return roundHalfAwayFromZero(amount * this.damageTakenMultiplier);
  }

  /** Returns the health actually removed. */
  takeDamage(amount: number): number {
    if (amount <= 0 || this.isDestroyed()) return 0;
    const before = this.currentHealth;
    this.currentHealth = Math.max(0, this.currentHealth - amount);
    if (this.currentHealth === 0) {
      this.effectActive = false;
    }
    return before - this.currentHealth;
  }

  reset(): void {
    this.currentHealth = this.maxHealth;
    this.lastSummonTurn = -1;
    this.firstSummonDone = false;
    this.effectActive = true;
  }

  snapshot(): GateSnapshot {
    return {
      gateId: this.gateId,
      gateType: this.gateType,
      column: this.column,
      health: this.currentHealth,
      maxHealth: this.maxHealth,
    };
  }
}
