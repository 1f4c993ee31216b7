import { parseBattleConfig, type BattleConfig, type BattleConfigInput } from '../data/BattleConfig';
import { bundledCombos } from '../data/ComboCatalog';
import { EnemyCatalog } from '../data/EnemyCatalog';
import { EnemyFactory } from '../data/EnemyFactory';
import { DEFAULT_LOADOUT, WeaponCatalog } from '../data/WeaponCatalog';
import { GridField } from '../field/GridField';
import { formatPosition, type GridPosition } from '../field/GridPosition';
import { PlayerState } from '../field/PlayerState';
import { ActionEconomy, type ActionSnapshot } from '../systems/ActionEconomy';
import { ComboEngine, type ComboProgress } from '../systems/ComboEngine';
import { DamagePipeline, type DamageModifier } from '../systems/DamagePipeline';
import { HandController, type CardSelectResult } from '../systems/HandController';
import { TargetSelector } from '../systems/TargetSelector';
import { TurnStateMachine } from '../systems/TurnStateMachine';
import {
  reject,
  type BattleEvent,
  type BattleEventPayloads,
  type BattleEventType,
  type BattleResult,
  type CardData,
  type CardPlayResult,
  type ComboDefinition,
  type EnemySnapshot,
  type GameState,
  type HandState,
  type Outcome,
  type PendingDamageInfo,
  type Rejection,
  type TargetSelection,
  type TurnEndReason,
  type WeaponData,
} from '../types';
import { createBattleStats, type BattleContext, type BattleStats } from './BattleContext';
import { DeferredTasks } from './DeferredTasks';
import { DiceRoller } from './DiceRoller';
import { EventBusImpl } from './EventBus';
import { createLogger, type Logger } from './Logger';

export interface BattleSessionOptions {
  config?: BattleConfigInput;
  /** Equipped weapons, at most four; defaults to the bundled starter loadout */
  weapons?: WeaponData[];
  combos?: ComboDefinition[];
  enemies?: EnemyCatalog;
  logger?: Logger;
}

/**
 * One battle. Owns every component, exposes the command surface and advances
 * time through `update`. Nothing is shared between sessions.
 */
export class BattleSession {
  readonly config: BattleConfig;
  readonly logger: Logger;
  private readonly events: EventBusImpl;
  private readonly dice: DiceRoller;
  private readonly clock = new DeferredTasks();
  private readonly field: GridField;
  private readonly player: PlayerState;
  private readonly enemyFactory = new EnemyFactory();
  private readonly ctx: BattleContext;

  private readonly combos: ComboEngine;
  private readonly pipeline: DamagePipeline;
  private readonly economy: ActionEconomy;
  private readonly hand: HandController;
  private readonly targets: TargetSelector;
  private readonly turns: TurnStateMachine;

  constructor(options: BattleSessionOptions = {}) {
    this.config = parseBattleConfig(options.config ?? {});
    this.logger = options.logger ?? createLogger('Battle', this.config.logLevel);
    this.events = new EventBusImpl(this.logger.child('EventBus'));
    this.dice = new DiceRoller(this.config.seed);
    this.field = new GridField(this.config.columnCount, this.dice, this.config.gates);
    this.player = new PlayerState({
      maxHealth: this.config.player.maxHealth,
      baseAttackPower: this.config.player.baseAttackPower,
      weapons: options.weapons ?? WeaponCatalog.bundled().loadout(DEFAULT_LOADOUT),
    });

    this.ctx = {
      config: this.config,
      field: this.field,
      player: this.player,
      dice: this.dice,
      events: this.events,
      logger: this.logger,
      clock: this.clock,
      enemies: options.enemies ?? EnemyCatalog.bundled(),
      enemyFactory: this.enemyFactory,
      stats: createBattleStats(),
      getTurn: () => this.turns.getTurn(),
      getState: () => this.turns.getState(),
      notify: <K extends BattleEventType>(type: K, data: BattleEventPayloads[K]) => {
        this.events.emit({ type, turn: this.turns.getTurn(), timestamp: this.clock.time, data });
      },
    };

    this.combos = new ComboEngine(options.combos ?? bundledCombos(), {
      maxActiveCombos: this.config.maxActiveCombos,
      notify: this.ctx.notify,
    });
    this.pipeline = new DamagePipeline(this.ctx, this.combos);
    this.economy = new ActionEconomy(this.ctx, () => {
      this.endPlayerTurn('actionsExhausted');
    });
    this.targets = new TargetSelector(this.ctx, {
      beforeChange: () => this.hand.clearPending(),
      afterChange: () => this.hand.retarget(),
    });
    this.hand = new HandController(this.ctx, this.pipeline, this.economy, () => this.targets.getSelection());
    this.turns = new TurnStateMachine(this.ctx, {
      economy: this.economy,
      hand: this.hand,
      combos: this.combos,
    });
  }

  // Lifecycle

  /** Enter the first player turn. */
  start(): Outcome<GameState> {
    if (!this.turns.start()) {
      return reject('statePrecondition', 'Battle has already started');
    }
    this.logger.info(`battle started: ${this.field.columnCount} gates (${this.field.gateTypes().join(', ')})`);
    return { ok: true, value: this.turns.getState() };
  }

  /**
   * Advance the session clock: deferred tasks, the turn timer, then the
   * outcome check. A turn that began during this step is not charged for it.
   */
  update(deltaSeconds: number): void {
    if (this.turns.isTerminal()) return;
    const turnBefore = this.turns.getTurn();
    this.clock.advance(deltaSeconds);
    if (this.turns.getTurn() === turnBefore) {
      this.turns.tick(deltaSeconds);
    }
    this.turns.checkOutcome();
  }

  /** Back to a fresh battle with the same configuration and seed, then start it. */
  resetBattle(): Outcome<GameState> {
    this.clock.reset();
    this.field.reset();
    this.player.reset();
    this.combos.reset();
    this.economy.reset();
    this.hand.clearHand();
    this.targets.reset();
    this.turns.reset();
    this.enemyFactory.reset();
    this.dice.setState({ seed: this.config.seed, callCount: 0 });
    this.ctx.stats = createBattleStats();
    this.events.clearHistory();
    this.logger.info('battle reset');
    return this.start();
  }

  // Targeting

  selectColumnTarget(column: number): Outcome<TargetSelection> {
    const blocked = this.rejectIfOver();
    return blocked ?? this.targets.selectColumn(column);
  }

  selectEnemyTarget(position: GridPosition): Outcome<TargetSelection> {
    const blocked = this.rejectIfOver();
    return blocked ?? this.targets.selectEnemy(position);
  }

  reselectLastTarget(): Outcome<TargetSelection> {
    const blocked = this.rejectIfOver();
    return blocked ?? this.targets.reselectLast();
  }

  clearTargetSelection(): boolean {
    return this.targets.clear();
  }

  // Cards

  selectCard(slotIndex: number): Outcome<CardSelectResult> {
    const outcome = this.hand.selectCard(slotIndex);
    this.turns.checkOutcome();
    return outcome;
  }

  playCard(slotIndex: number): Outcome<CardPlayResult> {
    const outcome = this.hand.playCard(slotIndex);
    this.turns.checkOutcome();
    return outcome;
  }

  // Turn and actions

  endPlayerTurn(reason: TurnEndReason = 'manual'): Outcome<GameState> {
    if (!this.turns.endPlayerTurn(reason)) {
      return reject('statePrecondition', `Cannot end the player turn during ${this.turns.getState()}`);
    }
    return { ok: true, value: this.turns.getState() };
  }

  addActionBonus(amount: number): Outcome<ActionSnapshot> {
    if (this.turns.isTerminal()) {
      return reject('statePrecondition', 'Battle is over');
    }
    if (!this.economy.addActionBonus(amount)) {
      return reject('invalidInput', `Action bonus must be a positive integer, got ${amount}`);
    }
    return { ok: true, value: this.economy.snapshot() };
  }

  addDamageModifier(name: string, modifier: DamageModifier): void {
    this.pipeline.addModifier(name, modifier);
  }

  removeDamageModifier(name: string): boolean {
    return this.pipeline.removeModifier(name);
  }

  /** Place a catalog enemy directly, for scripted encounters and tests. */
  placeEnemy(enemyId: number, position: GridPosition, gateId: number = position.column): Outcome<EnemySnapshot> {
    const blocked = this.rejectIfOver();
    if (blocked) return blocked;

    const data = this.ctx.enemies.get(enemyId);
    if (!data) {
      return reject('invalidInput', `Unknown enemy id ${enemyId}`);
    }
    if (!this.field.isValidPosition(position) || this.field.isOccupied(position)) {
      return reject('invalidInput', `Cannot place an enemy at ${formatPosition(position)}`);
    }

    const enemy = this.enemyFactory.create(data, gateId);
    this.field.placeEnemy(enemy, position);
    this.ctx.stats.enemiesSpawned++;
    this.ctx.notify('EnemySpawned', { enemy: enemy.snapshot(), gateId });
    return { ok: true, value: enemy.snapshot() };
  }

  // Queries

  getState(): GameState {
    return this.turns.getState();
  }

  getTurn(): number {
    return this.turns.getTurn();
  }

  getTime(): number {
    return this.clock.time;
  }

  getField(): GridField {
    return this.field;
  }

  getPlayer(): PlayerState {
    return this.player;
  }

  getHand(): (CardData | null)[] {
    return this.hand.getSlots();
  }

  getHandState(): HandState {
    return this.hand.getState();
  }

  getPendingDamage(): PendingDamageInfo | null {
    return this.hand.getPending();
  }

  checkPlayable(slotIndex: number): Outcome<CardData> {
    return this.hand.checkPlayable(slotIndex);
  }

  getActions(): ActionSnapshot {
    return this.economy.snapshot();
  }

  isAutoEndScheduled(): boolean {
    return this.economy.isAutoEndScheduled();
  }

  getSelection(): TargetSelection {
    return this.targets.getSelection();
  }

  getComboProgress(): ComboProgress[] {
    return this.combos.getProgress();
  }

  getStats(): BattleStats {
    return { ...this.ctx.stats, weaponUsage: { ...this.ctx.stats.weaponUsage } };
  }

  getResult(): BattleResult | null {
    return this.turns.getResult();
  }

  getEventBus(): EventBusImpl {
    return this.events;
  }

  getEventHistory(): BattleEvent[] {
    return this.events.getHistory();
  }

  subscribe<K extends BattleEventType>(type: K, callback: (event: BattleEvent<K>) => void): () => void {
    return this.events.subscribe(type, callback);
  }

  private rejectIfOver(): Rejection | null {
    return this.turns.isTerminal() ? reject('statePrecondition', 'Battle is over') : null;
  }
}
