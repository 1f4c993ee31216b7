import type { WeaponData } from '../types';
import { clamp } from '../utils/rounding';

export const MAX_EQUIPPED_WEAPONS = 4;

export interface PlayerSetup {
  maxHealth: number;
  baseAttackPower: number;
  weapons: WeaponData[];
}

export class PlayerState {
  readonly maxHealth: number;
  readonly baseAttackPower: number;
  readonly weapons: readonly WeaponData[];

  private currentHealth: number;
  private cooldowns: number[];
  private usedThisTurn: Set<number> = new Set();

  constructor(setup: PlayerSetup) {
    this.maxHealth = setup.maxHealth;
    this.baseAttackPower = setup.baseAttackPower;
    this.weapons = setup.weapons.slice(0, MAX_EQUIPPED_WEAPONS).map((weapon) => ({
      ...weapon,
      basePower: clamp(weapon.basePower, 0, 200),
    }));
    this.currentHealth = setup.maxHealth;
    this.cooldowns = this.weapons.map(() => 0);
  }

  get health(): number {
    return this.currentHealth;
  }

  isDefeated(): boolean {
    return this.currentHealth <= 0;
  }

  weapon(index: number): WeaponData | undefined {
    return this.weapons[index];
  }

  takeDamage(amount: number): number {
    if (amount <= 0) return 0;
    const before = this.currentHealth;
    this.currentHealth = Math.max(0, this.currentHealth - amount);
    return before - this.currentHealth;
  }

  heal(amount: number): number {
    if (amount <= 0 || this.isDefeated()) return 0;
    const before = this.currentHealth;
    this.currentHealth = Math.min(this.maxHealth, this.currentHealth + amount);
    return this.currentHealth - before;
  }

  cooldownOf(index: number): number {
    return this.cooldowns[index] ?? 0;
  }

  /** Whether the weapon may be used right now (cooldown and consecutive-use rule). */
  isWeaponReady(index: number): boolean {
    const weapon = this.weapons[index];
    if (!weapon) return false;
    if (this.cooldownOf(index) > 0) return false;
    return weapon.canUseConsecutively || !this.usedThisTurn.has(index);
  }

  markWeaponUsed(index: number): void {
    const weapon = this.weapons[index];
    if (!weapon) return;
    this.usedThisTurn.add(index);
    this.cooldowns[index] = weapon.cooldownTurns;
  }

  /** Player turn entry. */
  startTurn(): void {
    this.usedThisTurn.clear();
    this.cooldowns = this.cooldowns.map((c) => Math.max(0, c - 1));
  }

  reset(): void {
    this.currentHealth = this.maxHealth;
    this.cooldowns = this.weapons.map(() => 0);
    this.usedThisTurn.clear();
  }
}
