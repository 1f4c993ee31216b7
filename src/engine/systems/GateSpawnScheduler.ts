import type { BattleContext } from '../core/BattleContext';
import type { EnemyInstance } from '../field/EnemyInstance';
import type { Gate } from '../field/Gate';
import { isNoPosition } from '../field/GridPosition';
import type { EnemyData } from '../types';

export interface SpawnDecision {
  eligible: boolean;
  count: number;
}

const NOT_ELIGIBLE: SpawnDecision = { eligible: false, count: 0 };

const PATTERN_A_COUNT = 2;
const PATTERN_B_COUNT = 3;
const PATTERN_B_MIN_ELAPSED = 3;
const PATTERN_C_FIRST_COUNT = 5;
const PATTERN_C_COUNT = 1;
const PATTERN_C_MIN_ELAPSED = 2;
const ON_DAMAGE_THRESHOLD = 0.8;
const DEFENSIVE_THRESHOLD = 0.5;

export class GateSpawnScheduler {
  /**
   * Whether a gate summons this turn and how many. Pure; the gate is not touched.
   */
  static decide(gate: Gate, currentTurn: number): SpawnDecision {
    if (gate.isDestroyed()) return NOT_ELIGIBLE;

    if (gate.spawnPattern === 'patternC' && !gate.firstSummonDone) {
      return { eligible: true, count: PATTERN_C_FIRST_COUNT };
    }

    const elapsed = currentTurn - gate.lastSummonTurn;
    if (elapsed < gate.summonInterval) return NOT_ELIGIBLE;

    switch (gate.spawnPattern) {
      case 'none':
        return NOT_ELIGIBLE;
      case 'patternA':
        return { eligible: true, count: PATTERN_A_COUNT };
      case 'patternB':
        return elapsed >= PATTERN_B_MIN_ELAPSED ? { eligible: true, count: PATTERN_B_COUNT } : NOT_ELIGIBLE;
      case 'patternC':
        return elapsed >= PATTERN_C_MIN_ELAPSED ? { eligible: true, count: PATTERN_C_COUNT } : NOT_ELIGIBLE;
      case 'periodic':
        return currentTurn % gate.summonInterval === 0 ? { eligible: true, count: gate.summonCount } : NOT_ELIGIBLE;
      case 'onDamage':
        return gate.healthRatio() < ON_DAMAGE_THRESHOLD ? { eligible: true, count: gate.summonCount } : NOT_ELIGIBLE;
      case 'defensive':
        return gate.healthRatio() < DEFENSIVE_THRESHOLD ? { eligible: true, count: gate.summonCount } : NOT_ELIGIBLE;
      case 'continuous':
        return { eligible: true, count: gate.summonCount };
    }
  }

  /** Run one spawning pass over every gate, in column order. */
  static processGates(ctx: BattleContext): EnemyInstance[] {
    const spawned: EnemyInstance[] = [];
    const turn = ctx.getTurn();

    for (const gate of ctx.field.allGates()) {
      const decision = GateSpawnScheduler.decide(gate, turn);
      if (!decision.eligible) continue;

      spawned.push(...GateSpawnScheduler.spawnFromGate(ctx, gate, decision.count));
      gate.lastSummonTurn = turn;
      if (gate.spawnPattern === 'patternC') {
        gate.firstSummonDone = true;
      }
    }

    return spawned;
  }

  /** Place up to `count` enemies for a gate; stops once the grid is full. */
  static spawnFromGate(ctx: BattleContext, gate: Gate, count: number): EnemyInstance[] {
    const spawned: EnemyInstance[] = [];

    for (let i = 0; i < count; i++) {
      const position = ctx.field.randomEmptyPosition();
      if (isNoPosition(position)) {
        ctx.logger.debug(`gate ${gate.gateId} has no free cell, stopping after ${i}`);
        break;
      }

      const data = GateSpawnScheduler.pickEnemy(ctx, gate);
      if (!data) {
        ctx.logger.warn(`gate ${gate.gateId} could not resolve an enemy to summon`);
        continue;
      }

      const enemy = ctx.enemyFactory.create(data, gate.gateId);
      if (!ctx.field.placeEnemy(enemy, position)) {
        ctx.logger.warn(`could not place ${enemy.instanceId} at (${position.column}, ${position.row})`);
        continue;
      }

      ctx.stats.enemiesSpawned++;
      spawned.push(enemy);
      ctx.logger.debug(`gate ${gate.gateId} summoned ${enemy.name} at (${position.column}, ${position.row})`);
      ctx.notify('EnemySpawned', { enemy: enemy.snapshot(), gateId: gate.gateId });
    }

    return spawned;
  }

  private static pickEnemy(ctx: BattleContext, gate: Gate): EnemyData | undefined {
    const id = ctx.dice.pick(gate.allowedEnemyIds);
    if (id !== undefined) {
      const data = ctx.enemies.get(id);
      if (data) return data;
      ctx.logger.warn(`unknown enemy id ${id} in gate ${gate.gateId} pool, using the gate default`);
    }
    return ctx.enemies.defaultForGate(gate.gateType);
  }
}
