import type { BattleConfig } from '../data/BattleConfig';
import type { EnemyCatalog } from '../data/EnemyCatalog';
import type { EnemyFactory } from '../data/EnemyFactory';
import type { GridField } from '../field/GridField';
import type { PlayerState } from '../field/PlayerState';
import type { BattleEventPayloads, BattleEventType, GameState } from '../types';
import type { DeferredTasks } from './DeferredTasks';
import type { DiceRoller } from './DiceRoller';
import type { EventBusImpl } from './EventBus';
import type { Logger } from './Logger';

export interface BattleStats {
  totalDamageDealt: number;
  totalDamageTaken: number;
  enemiesDefeated: number;
  gatesDestroyed: number;
  destructionRewards: number;
  enemiesSpawned: number;
  cardsPlayed: number;
  weaponUsage: Record<string, number>;
}

export function createBattleStats(): BattleStats {
  return {
    totalDamageDealt: 0,
    totalDamageTaken: 0,
    enemiesDefeated: 0,
    gatesDestroyed: 0,
    destructionRewards: 0,
    enemiesSpawned: 0,
    cardsPlayed: 0,
    weaponUsage: {},
  };
}

/**
 * Everything one battle shares. Systems receive this instead of reaching for
 * globals, so two sessions can run side by side.
 */
export interface BattleContext {
  readonly config: BattleConfig;
  readonly field: GridField;
  readonly player: PlayerState;
  readonly dice: DiceRoller;
  readonly events: EventBusImpl;
  readonly logger: Logger;
  readonly clock: DeferredTasks;
  readonly enemies: EnemyCatalog;
  readonly enemyFactory: EnemyFactory;
  stats: BattleStats;
  getTurn(): number;
  getState(): GameState;
  /** Emit an event stamped with the current turn and session time. */
  notify<K extends BattleEventType>(type: K, data: BattleEventPayloads[K]): void;
}
