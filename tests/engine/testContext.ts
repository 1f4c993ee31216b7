import type { BattleContext } from '../../src/engine/core/BattleContext';
import { createBattleStats } from '../../src/engine/core/BattleContext';
import { DeferredTasks } from '../../src/engine/core/DeferredTasks';
import { DiceRoller } from '../../src/engine/core/DiceRoller';
import { EventBusImpl } from '../../src/engine/core/EventBus';
import { silentLogger } from '../../src/engine/core/Logger';
import { parseBattleConfig, type BattleConfigInput } from '../../src/engine/data/BattleConfig';
import { EnemyCatalog } from '../../src/engine/data/EnemyCatalog';
import { EnemyFactory } from '../../src/engine/data/EnemyFactory';
import { GridField } from '../../src/engine/field/GridField';
import { PlayerState } from '../../src/engine/field/PlayerState';
import type {
  BattleEventPayloads,
  BattleEventType,
  EnemyData,
  GameState,
  WeaponData,
} from '../../src/engine/types';

export function testWeapon(overrides: Partial<WeaponData> = {}): WeaponData {
  return {
    name: 'Test Sword',
    attribute: 'fire',
    weaponType: 'sword',
    basePower: 100,
    range: 'singleFront',
    criticalRate: 0,
    cooldownTurns: 0,
    canUseConsecutively: true,
    ...overrides,
  };
}

export function testEnemy(overrides: Partial<EnemyData> = {}): EnemyData {
  return {
    id: 900,
    name: 'Dummy',
    category: 'attacker',
    baseHealth: 80,
    attackPower: 10,
    defense: 0,
    primaryAction: 'attack',
    ...overrides,
  };
}

export interface TestContextOptions {
  config?: BattleConfigInput;
  weapons?: WeaponData[];
  enemies?: EnemyData[];
}

export interface TestFlow {
  turn: number;
  state: GameState;
}

/** A bare battle context whose turn and state the test drives by hand. */
export function createTestContext(options: TestContextOptions = {}): { ctx: BattleContext; flow: TestFlow } {
  const config = parseBattleConfig({ logLevel: 'silent', baseCriticalChance: 0, ...options.config });
  const dice = new DiceRoller(config.seed);
  const events = new EventBusImpl(silentLogger);
  const clock = new DeferredTasks();
  const flow: TestFlow = { turn: 1, state: 'playerTurn' };

  const ctx: BattleContext = {
    config,
    field: new GridField(config.columnCount, dice, config.gates),
    player: new PlayerState({
      maxHealth: config.player.maxHealth,
      baseAttackPower: config.player.baseAttackPower,
      weapons: options.weapons ?? [testWeapon()],
    }),
    dice,
    events,
    logger: silentLogger,
    clock,
    enemies: new EnemyCatalog([...EnemyCatalog.bundled().all(), ...(options.enemies ?? [])]),
    enemyFactory: new EnemyFactory(),
    stats: createBattleStats(),
    getTurn: () => flow.turn,
    getState: () => flow.state,
    notify: <K extends BattleEventType>(type: K, data: BattleEventPayloads[K]) => {
      events.emit({ type, turn: flow.turn, timestamp: clock.time, data });
    },
  };

  return { ctx, flow };
}
