import type { BattleContext } from '../core/BattleContext';
import { ATTACK_BOOST_BUFF, DEFENSE_BOOST_BUFF, GATE_BOOST_BUFF } from '../field/EnemyInstance';
import type { Gate } from '../field/Gate';
import { roundHalfAwayFromZero } from '../utils/rounding';
import { GateSpawnScheduler } from './GateSpawnScheduler';

export interface EnemyTurnReport {
  attacks: number;
  damageTaken: number;
  spawned: number;
  effectsApplied: number;
}

const REGENERATION_RATIO = 0.1;

/**
 * The enemy phase, in order: attacks, gate summoning, gate strategic
 * effects, then end-of-turn upkeep on every enemy. A defeated player ends the
 * phase right after the attacks.
 */
export class EnemyTurnSystem {
  static run(ctx: BattleContext): EnemyTurnReport {
    const report: EnemyTurnReport = { attacks: 0, damageTaken: 0, spawned: 0, effectsApplied: 0 };

    EnemyTurnSystem.processAttacks(ctx, report);
    if (ctx.player.isDefeated()) {
      ctx.logger.debug(`enemy turn: player defeated after ${report.attacks} attacks`);
      return report;
    }

    report.spawned = GateSpawnScheduler.processGates(ctx).length;
    for (const gate of ctx.field.aliveGates()) {
      if (EnemyTurnSystem.applyGateEffect(ctx, gate) > 0) report.effectsApplied++;
    }
    for (const enemy of ctx.field.allEnemies()) {
      enemy.onTurnEnd();
    }

    ctx.logger.debug(
      `enemy turn: ${report.attacks} attacks for ${report.damageTaken}, ${report.spawned} spawned`
    );
    return report;
  }

  static processAttacks(ctx: BattleContext, report: EnemyTurnReport): void {
    const { player, stats } = ctx;

    for (const enemy of ctx.field.allEnemies()) {
      if (player.isDefeated()) break;
      if (enemy.actionCooldown > 0 || enemy.primaryAction !== 'attack') continue;

      const taken = player.takeDamage(enemy.effectiveAttackPower());
      report.attacks++;
      report.damageTaken += taken;
      stats.totalDamageTaken += taken;
      ctx.notify('PlayerDamaged', { amount: taken, health: player.health, sourceId: enemy.instanceId });
    }

    if (report.attacks > 0) {
      ctx.notify('PlayerDataChanged', {
        health: player.health,
        maxHealth: player.maxHealth,
        baseAttackPower: player.baseAttackPower,
      });
    }
  }

  /** Returns the number of enemies affected. */
  static applyGateEffect(ctx: BattleContext, gate: Gate): number {
    if (gate.isDestroyed() || !gate.effectActive) return 0;

    let affected = 0;
    switch (gate.strategicEffect) {
      case 'none':
        return 0;
      case 'buffAllEnemies':
        for (const enemy of ctx.field.allEnemies()) {
          enemy.applyBuff(GATE_BOOST_BUFF, gate.effectStrength);
          affected++;
        }
        break;
      case 'attackBoost':
        for (const enemy of ctx.field.enemiesOfGate(gate.gateId)) {
          enemy.applyBuff(ATTACK_BOOST_BUFF, gate.effectStrength);
          affected++;
        }
        break;
      case 'defenseBoost':
        for (const enemy of ctx.field.enemiesOfGate(gate.gateId)) {
          enemy.applyBuff(DEFENSE_BOOST_BUFF, gate.effectStrength);
          affected++;
        }
        break;
      case 'regeneration':
        for (const enemy of ctx.field.enemiesOfGate(gate.gateId)) {
          if (enemy.heal(roundHalfAwayFromZero(enemy.maxHealth * REGENERATION_RATIO)) > 0) affected++;
        }
        break;
    }

    if (affected > 0) {
      ctx.notify('GateEffectApplied', { gateId: gate.gateId, effect: gate.strategicEffect, affected });
    }
    return affected;
  }
}
