import type { EnemyActionType, EnemyCategory, EnemyData, EnemySnapshot } from '../types';
import { roundHalfAwayFromZero } from '../utils/rounding';
import { NO_POSITION, type GridPosition } from './GridPosition';

export const GATE_BOOST_BUFF = 'GateBoost';
export const ATTACK_BOOST_BUFF = 'AttackBoost';
export const DEFENSE_BOOST_BUFF = 'DefenseBoost';

export interface EnemyBuff {
  multiplier: number;
  /** Turns left; undefined lasts until removed */
  remainingTurns?: number;
}

const ATTACK_BUFFS = [GATE_BOOST_BUFF, ATTACK_BOOST_BUFF];

export class EnemyInstance {
  readonly instanceId: string;
  readonly data: EnemyData;
  readonly maxHealth: number;
  readonly assignedGateId: number;

  position: GridPosition = NO_POSITION;
  actionCooldown = 0;
  turnsSinceSpawn = 0;

  private currentHealth: number;
  private buffs: Map<string, EnemyBuff> = new Map();

  constructor(instanceId: string, data: EnemyData, assignedGateId: number) {
    this.instanceId = instanceId;
    this.data = data;
    this.maxHealth = data.baseHealth;
    this.currentHealth = data.baseHealth;
    this.assignedGateId = assignedGateId;
  }

  get name(): string {
    return this.data.name;
  }

  get category(): EnemyCategory {
    return this.data.category;
  }

  get primaryAction(): EnemyActionType {
    return this.data.primaryAction;
  }

  get health(): number {
    return this.currentHealth;
  }

  isAlive(): boolean {
    return this.currentHealth > 0;
  }

  effectiveAttackPower(): number {
    let multiplier = 1;
    for (const name of ATTACK_BUFFS) {
      multiplier *= this.buffs.get(name)?.multiplier ?? 1;
    }
    return roundHalfAwayFromZero(this.data.attackPower * multiplier);
  }

  effectiveDefense(): number {
    const multiplier = this.buffs.get(DEFENSE_BOOST_BUFF)?.multiplier ?? 1;
    return roundHalfAwayFromZero(this.data.defense * multiplier);
  }

  /**
   * Defense soaks damage but every hit lands for at least 1.
   * Returns the health actually removed.
   */
  takeDamage(amount: number): number {
    if (!this.isAlive() || amount <= 0) return 0;
    const dealt = Math.max(1, amount - this.effectiveDefense());
    const before = this.currentHealth;
    this.currentHealth = Math.max(0, this.currentHealth - dealt);
    return before - this.currentHealth;
  }

  heal(amount: number): number {
    if (!this.isAlive() || amount <= 0) return 0;
    const before = this.currentHealth;
    this.currentHealth = Math.min(this.maxHealth, this.currentHealth + amount);
    return this.currentHealth - before;
  }

  /** Re-applying a buff replaces it. */
  applyBuff(name: string, multiplier: number, durationTurns?: number): void {
    this.buffs.set(name, { multiplier, remainingTurns: durationTurns });
  }

  removeBuff(name: string): boolean {
    return this.buffs.delete(name);
  }

  getBuff(name: string): EnemyBuff | undefined {
    return this.buffs.get(name);
  }

  buffNames(): string[] {
    return [...this.buffs.keys()];
  }

  /** End of the enemy turn: age the enemy, tick cooldown and timed buffs. */
  onTurnEnd(): void {
    this.turnsSinceSpawn++;
    if (this.actionCooldown > 0) this.actionCooldown--;

    for (const [name, buff] of [...this.buffs]) {
      if (buff.remainingTurns === undefined) continue;
      buff.remainingTurns--;
      if (buff.remainingTurns <= 0) {
        this.buffs.delete(name);
      }
    }
  }

  snapshot(): EnemySnapshot {
    return {
      instanceId: this.instanceId,
      name: this.data.name,
      position: this.position,
      health: this.currentHealth,
      maxHealth: this.maxHealth,
      assignedGateId: this.assignedGateId,
    };
  }
}
