import type { BattleContext } from '../core/BattleContext';

export const AUTO_END_TASK = 'autoEndTurn';

export interface ActionSnapshot {
  remaining: number;
  max: number;
  bonus: number;
}

export class ActionEconomy {
  private remaining = 0;
  private maxPerTurn = 0;
  private bonus = 0;
  private exhausted = false;

  constructor(
    private readonly ctx: BattleContext,
    private readonly onAutoEnd: () => void
  ) {}

  get baseActions(): number {
    return this.ctx.config.baseActionsPerTurn;
  }

  resetForTurn(): void {
    this.cancelAutoEnd();
    this.maxPerTurn = this.baseActions + this.bonus;
    this.remaining = this.maxPerTurn;
    this.exhausted = false;
    this.emitChanged();
  }

  canTakeAction(): boolean {
    return this.remaining > 0;
  }

  isExhausted(): boolean {
    return this.exhausted;
  }

  /**
   * Spend one action. Returns true when this consumption scheduled the
   * automatic end of the turn.
   */
  consumeAction(): boolean {
    if (this.remaining <= 0) return false;

    this.remaining--;
    this.emitChanged();

    if (this.remaining > 0 || this.exhausted) return false;

    this.exhausted = true;
    this.ctx.notify('ActionsExhausted', { max: this.maxPerTurn });

    const { autoEndTurnOnExhaustion, autoEndTurnDelaySeconds } = this.ctx.config;
    if (!autoEndTurnOnExhaustion) return false;

    this.ctx.clock.schedule(autoEndTurnDelaySeconds, AUTO_END_TASK, this.onAutoEnd);
    this.ctx.notify('AutoTurnEnd', { delaySeconds: autoEndTurnDelaySeconds });
    this.ctx.logger.debug(`actions exhausted, ending turn in ${autoEndTurnDelaySeconds}s`);
    return true;
  }

  /**
   * Permanent bonus: raises every later turn's maximum, and the current turn's
   * when granted during the player's turn. A bonus that arrives while an
   * automatic end is pending cancels it.
   */
  addActionBonus(amount: number): boolean {
    if (!Number.isInteger(amount) || amount <= 0) return false;

    this.bonus += amount;
    if (this.ctx.getState() === 'playerTurn') {
      this.maxPerTurn += amount;
      this.remaining += amount;
      if (this.exhausted) {
        this.exhausted = false;
        this.cancelAutoEnd();
      }
      this.emitChanged();
    }
    return true;
  }

  resetActionBonus(): void {
    this.bonus = 0;
  }

  cancelAutoEnd(): void {
    this.ctx.clock.cancelByLabel(AUTO_END_TASK);
  }

  isAutoEndScheduled(): boolean {
    return this.ctx.clock.isScheduled(AUTO_END_TASK);
  }

  snapshot(): ActionSnapshot {
    return { remaining: this.remaining, max: this.maxPerTurn, bonus: this.bonus };
  }

  /** Battle reset: everything back to zero, bonus included. */
  reset(): void {
    this.cancelAutoEnd();
    this.remaining = 0;
    this.maxPerTurn = 0;
    this.bonus = 0;
    this.exhausted = false;
  }

  private emitChanged(): void {
    this.ctx.notify('ActionsChanged', { remaining: this.remaining, max: this.maxPerTurn });
  }
}
