// Gate type definitions from the battle design table

import type { GateSpawnPattern, GateStrategicEffect, GateType } from '../types';

export interface GateTemplate {
  gateType: GateType;
  displayName: string;
  maxHealth: number;
  spawnPattern: GateSpawnPattern;
  summonInterval: number; // turns between summons
  summonCount: number; // used by patterns without a fixed count
  strategicEffect: GateStrategicEffect;
  effectStrength: number; // 1.0 = 100%
  damageTakenMultiplier: number; // applied to card damage against this gate
  // Enemy catalog ids this gate may summon; empty = the gate type's default enemy
  allowedEnemyIds: number[];
  destructionReward: number;
  hasDestructionBonus: boolean;
}

export const GATE_TEMPLATES: Record<GateType, GateTemplate> = {
  standard: {
    gateType: 'standard',
    displayName: 'Standard Gate',
    maxHealth: 25000,
    spawnPattern: 'patternA',
    summonInterval: 3,
    summonCount: 1,
    strategicEffect: 'none',
    effectStrength: 1.0,
    damageTakenMultiplier: 1.0,
    allowedEnemyIds: [],
    destructionReward: 100,
    hasDestructionBonus: false,
  },
  elite: {
    gateType: 'elite',
    displayName: 'Elite Gate',
    maxHealth: 35000,
    spawnPattern: 'onDamage',
    summonInterval: 2,
    summonCount: 1,
    strategicEffect: 'attackBoost',
    effectStrength: 1.5,
    damageTakenMultiplier: 0.8,
    allowedEnemyIds: [],
    destructionReward: 100,
    hasDestructionBonus: false,
  },
  support: {
    gateType: 'support',
    displayName: 'Support Gate',
    maxHealth: 20000,
    spawnPattern: 'patternB',
    summonInterval: 4,
    summonCount: 2,
    strategicEffect: 'buffAllEnemies',
    effectStrength: 1.2,
    damageTakenMultiplier: 1.0,
    allowedEnemyIds: [],
    destructionReward: 100,
    hasDestructionBonus: false,
  },
  summoner: {
    gateType: 'summoner',
    displayName: 'Summoner Gate',
    maxHealth: 15000,
    spawnPattern: 'patternC',
    summonInterval: 2,
    summonCount: 3,
    strategicEffect: 'none',
    effectStrength: 1.0,
    damageTakenMultiplier: 1.0,
    allowedEnemyIds: [],
    destructionReward: 100,
    hasDestructionBonus: false,
  },
  fortress: {
    gateType: 'fortress',
    displayName: 'Fortress Gate',
    maxHealth: 50000,
    spawnPattern: 'defensive',
    summonInterval: 5,
    summonCount: 1,
    strategicEffect: 'defenseBoost',
    effectStrength: 2.0,
    damageTakenMultiplier: 0.5,
    allowedEnemyIds: [],
    destructionReward: 500,
    hasDestructionBonus: true,
  },
};

const FIXED_LAYOUTS: Record<number, GateType[]> = {
  1: ['fortress'],
  2: ['support', 'standard'],
  3: ['support', 'standard', 'elite'],
  4: ['support', 'summoner', 'standard', 'elite'],
  5: ['support', 'summoner', 'standard', 'elite', 'fortress'],
  6: ['support', 'summoner', 'standard', 'standard', 'elite', 'fortress'],
};

const CYCLIC_LAYOUT: GateType[] = ['support', 'standard', 'elite'];

/** Gate type for a column, fixed by the total number of gates. */
export function gateTypeForLayout(gateIndex: number, totalGates: number): GateType {
  const fixed = FIXED_LAYOUTS[totalGates];
  if (fixed) {
    return fixed[gateIndex] ?? fixed[fixed.length - 1];
  }
  return CYCLIC_LAYOUT[gateIndex % CYCLIC_LAYOUT.length];
}

export function gateLayout(totalGates: number): GateType[] {
  return Array.from({ length: totalGates }, (_, i) => gateTypeForLayout(i, totalGates));
}
