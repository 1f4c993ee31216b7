import type { BattleContext } from '../core/BattleContext';
import { nonNegative } from '../core/DeferredTasks';
import type { BattleEndCondition, BattleResult, GameState, TurnEndReason } from '../types';
import type { ActionEconomy } from './ActionEconomy';
import type { ComboEngine } from './ComboEngine';
import { EnemyTurnSystem } from './EnemyTurnSystem';
import type { HandController } from './HandController';

export interface TurnDependencies {
  economy: ActionEconomy;
  hand: HandController;
  combos: ComboEngine;
}

const TERMINAL: ReadonlySet<GameState> = new Set<GameState>(['victory', 'defeat']);

/**
 * Initializing → PlayerTurn ⇄ EnemyTurn → Victory | Defeat.
 * Victory and defeat are terminal until the battle is reset.
 */
export class TurnStateMachine {
  private state: GameState = 'initializing';
  private turn = 0;
  private turnTimer = 0;
  private result: BattleResult | null = null;

  constructor(
    private readonly ctx: BattleContext,
    private readonly deps: TurnDependencies
  ) {}

  getState(): GameState {
    return this.state;
  }

  getTurn(): number {
    return this.turn;
  }

  getTurnTimer(): number {
    return this.turnTimer;
  }

  getResult(): BattleResult | null {
    return this.result;
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.state);
  }

  start(): boolean {
    if (this.state !== 'initializing') return false;
    this.enterPlayerTurn();
    return true;
  }

  /** Ignored outside the player's turn. */
  endPlayerTurn(reason: TurnEndReason): boolean {
    if (this.state !== 'playerTurn') return false;

    this.deps.economy.cancelAutoEnd();
    this.deps.hand.markTurnEnded();
    this.ctx.notify('TurnEnded', { reason });
    this.ctx.logger.debug(`turn ${this.turn} ended (${reason})`);

    // A commit may already have finished the battle
    if (this.checkOutcome()) return true;

    this.changeState('enemyTurn');
    EnemyTurnSystem.run(this.ctx);

    if (!this.checkOutcome()) {
      this.enterPlayerTurn();
    }
    return true;
  }

  /** Advance the turn timer; a positive limit ends the player's turn with `timeout`. */
  tick(deltaSeconds: number): void {
    const limit = this.ctx.config.turnTimeLimitSeconds;
    if (this.state !== 'playerTurn' || limit <= 0) return;

    this.turnTimer += nonNegative(deltaSeconds);
    if (this.turnTimer >= limit) {
      this.endPlayerTurn('timeout');
    }
  }

  /**
   * Victory is checked before defeat. Returns true when the battle is over
   * (including when it already was).
   */
  checkOutcome(): boolean {
    if (this.isTerminal()) return true;
    if (this.state === 'initializing') return false;

    const condition = this.evaluateOutcome();
    if (!condition) return false;

    this.finish(condition);
    return true;
  }

  evaluateOutcome(): BattleEndCondition | null {
    const { field, player, stats, config } = this.ctx;

    if (field.allGatesDestroyed()) return 'allGatesDestroyed';
    // An empty field before anything has spawned is not a win
    if (stats.enemiesSpawned > 0 && field.aliveEnemyCount() === 0) return 'allEnemiesDefeated';
    if (player.isDefeated()) return 'playerDefeated';
    if (this.turn >= config.maxTurns) return 'turnLimit';
    return null;
  }

  reset(): void {
    this.state = 'initializing';
    this.turn = 0;
    this.turnTimer = 0;
    this.result = null;
  }

  private enterPlayerTurn(): void {
    this.turn++;
    this.turnTimer = 0;
    this.changeState('playerTurn');
    this.ctx.notify('TurnChanged', { turn: this.turn });

    const { player } = this.ctx;
    player.startTurn();
    this.ctx.notify('PlayerDataChanged', {
      health: player.health,
      maxHealth: player.maxHealth,
      baseAttackPower: player.baseAttackPower,
    });

    this.deps.economy.resetForTurn();
    this.deps.combos.expireStale(this.turn);
    this.deps.hand.generateHand();

    this.checkOutcome();
  }

  private finish(condition: BattleEndCondition): void {
    const isVictory = condition === 'allGatesDestroyed' || condition === 'allEnemiesDefeated';
    const { stats } = this.ctx;

    this.result = {
      isVictory,
      condition,
      turnsUsed: this.turn,
      totalDamageDealt: stats.totalDamageDealt,
      totalDamageTaken: stats.totalDamageTaken,
      enemiesDefeated: stats.enemiesDefeated,
      gatesDestroyed: stats.gatesDestroyed,
      destructionRewards: stats.destructionRewards,
    };

    this.changeState(isVictory ? 'victory' : 'defeat');
    this.deps.hand.clearHand();
    this.ctx.clock.cancelAll();
    this.ctx.logger.info(`battle ended: ${isVictory ? 'victory' : 'defeat'} (${condition}) on turn ${this.turn}`);
    this.ctx.notify('BattleEnded', { result: this.result });
  }

  private changeState(next: GameState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    this.ctx.notify('GameStateChanged', { previous, state: next });
  }
}
