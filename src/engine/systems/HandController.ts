import type { BattleContext } from '../core/BattleContext';
import type { PlayerState } from '../field/PlayerState';
import {
  reject,
  type CardData,
  type CardPlayResult,
  type HandState,
  type Outcome,
  type PendingDamageInfo,
  type Rejection,
  type TargetSelection,
} from '../types';
import type { ActionEconomy } from './ActionEconomy';
import type { DamagePipeline } from './DamagePipeline';

export type CardSelectResult =
  | { kind: 'preview'; pending: PendingDamageInfo }
  | { kind: 'played'; result: CardPlayResult };

export function targetColumnFor(weaponIndex: number, selection: TargetSelection, columnCount: number): number {
  return selection.kind === 'none' ? weaponIndex % columnCount : selection.column;
}

/** One card per equipped weapon, aimed at the selected column or the weapon's own lane. */
export function buildCards(player: PlayerState, selection: TargetSelection, columnCount: number): CardData[] {
  return player.weapons.map((weapon, weaponIndex) => {
    const targetColumn = targetColumnFor(weaponIndex, selection, columnCount);
    return {
      cardId: `${weapon.name}:${weaponIndex}:${targetColumn}`,
      weapon,
      weaponIndex,
      targetColumn,
      displayName: weapon.name,
    };
  });
}

/**
 * Fixed-size hand with the two-click protocol: the first selection of a slot
 * previews, selecting the same slot again commits.
 */
export class HandController {
  private slots: (CardData | null)[] = [];
  private state: HandState = 'empty';
  private pending: PendingDamageInfo | null = null;
  // Critical rolls per slot, made once per dealt card
  private criticalRolls: Map<number, boolean> = new Map();

  constructor(
    private readonly ctx: BattleContext,
    private readonly pipeline: DamagePipeline,
    private readonly economy: ActionEconomy,
    private readonly getSelection: () => TargetSelection
  ) {}

  get handSize(): number {
    return this.ctx.config.handSize;
  }

  getSlots(): (CardData | null)[] {
    return [...this.slots];
  }

  getCard(slotIndex: number): CardData | null {
    return this.slots[slotIndex] ?? null;
  }

  getState(): HandState {
    return this.state;
  }

  getPending(): PendingDamageInfo | null {
    return this.pending;
  }

  remainingCards(): number {
    return this.slots.filter((c) => c !== null).length;
  }

  generateHand(): void {
    this.clearPending();
    this.criticalRolls.clear();
    const cards = buildCards(this.ctx.player, this.getSelection(), this.ctx.field.columnCount);

    this.slots = Array.from({ length: this.handSize }, (_, i) =>
      cards.length > 0 ? cards[i % cards.length] : null
    );
    this.ctx.notify('HandGenerated', { cards: this.getSlots() });
    this.setState('generated');
  }

  /** Point the cards still in hand at a new selection. */
  retarget(): void {
    const selection = this.getSelection();
    const columnCount = this.ctx.field.columnCount;
    this.slots = this.slots.map((card) => {
      if (!card) return null;
      const targetColumn = targetColumnFor(card.weaponIndex, selection, columnCount);
      return { ...card, targetColumn, cardId: `${card.weapon.name}:${card.weaponIndex}:${targetColumn}` };
    });
  }

  markTurnEnded(): void {
    this.clearPending();
    this.setState('turnEnded');
  }

  clearHand(): void {
    this.clearPending();
    this.criticalRolls.clear();
    this.slots = this.slots.map(() => null);
    this.ctx.notify('HandCleared', {});
    this.setState('empty');
  }

  clearPending(): void {
    if (!this.pending) return;
    this.pending = null;
    this.ctx.notify('PendingDamageCleared', {});
  }

  /** Every precondition for playing a slot, checked in a fixed order. */
  checkPlayable(slotIndex: number): Outcome<CardData> {
    const gameState = this.ctx.getState();
    if (gameState !== 'playerTurn') {
      return reject('statePrecondition', `Cards cannot be played during ${gameState}`);
    }
    if (!Number.isInteger(slotIndex) || slotIndex < 0 || slotIndex >= this.slots.length) {
      return reject('invalidInput', `Slot ${slotIndex} is out of range`);
    }
    const card = this.slots[slotIndex];
    if (!card) {
      return reject('statePrecondition', `Slot ${slotIndex} is empty`);
    }
    if (this.state !== 'generated' && this.state !== 'cardUsed') {
      return reject('statePrecondition', `Hand is ${this.state}`);
    }
    const targets = this.pipeline.resolveTargets(card, this.getSelection());
    if (targets.enemies.length === 0 && targets.gates.length === 0) {
      return reject('resolutionFailure', 'No valid target');
    }
    if (!this.ctx.player.isWeaponReady(card.weaponIndex)) {
      return reject('statePrecondition', `${card.weapon.name} is not ready`);
    }
    if (!this.economy.canTakeAction()) {
      return reject('statePrecondition', 'No actions remaining');
    }
    return { ok: true, value: card };
  }

  /** First click previews, a second click on the same slot commits. */
  selectCard(slotIndex: number): Outcome<CardSelectResult> {
    const playable = this.checkPlayable(slotIndex);
    if (!playable.ok) return this.rejected(slotIndex, playable);

    if (this.pending && this.pending.slotIndex === slotIndex) {
      const played = this.commit(slotIndex, playable.value);
      return played.ok ? { ok: true, value: { kind: 'played', result: played.value } } : played;
    }

    const preview = this.pipeline.preview(
      playable.value,
      slotIndex,
      this.getSelection(),
      this.criticalFor(slotIndex, playable.value)
    );
    if (!preview.ok) return this.rejected(slotIndex, preview);

    this.clearPending();
    this.pending = preview.value;
    this.ctx.notify('PendingDamageCalculated', { pending: preview.value });
    return { ok: true, value: { kind: 'preview', pending: preview.value } };
  }

  /** Commit a slot without a preview click. */
  playCard(slotIndex: number): Outcome<CardPlayResult> {
    const playable = this.checkPlayable(slotIndex);
    if (!playable.ok) return this.rejected(slotIndex, playable);
    return this.commit(slotIndex, playable.value);
  }

  private commit(slotIndex: number, card: CardData): Outcome<CardPlayResult> {
    const committed = this.pipeline.commit(card, slotIndex, this.getSelection(), this.criticalFor(slotIndex, card));
    if (!committed.ok) return this.rejected(slotIndex, committed);
    this.criticalRolls.delete(slotIndex);

    const { pending, combo } = committed.value;
    this.clearPending();
    this.pending = pending;
    this.ctx.notify('PendingDamageCalculated', { pending });

    const applied = this.pipeline.apply(pending);
    this.ctx.notify('PendingDamageApplied', { pending, damageDealt: applied.damageDealt });
    this.clearPending();

    const { player, stats } = this.ctx;
    player.markWeaponUsed(card.weaponIndex);
    if (combo.healing > 0) {
      player.heal(combo.healing);
      this.ctx.notify('PlayerDataChanged', {
        health: player.health,
        maxHealth: player.maxHealth,
        baseAttackPower: player.baseAttackPower,
      });
    }
    if (combo.bonusActions > 0) {
      this.economy.addActionBonus(combo.bonusActions);
    }

    this.slots[slotIndex] = null;
    stats.cardsPlayed++;
    stats.weaponUsage[card.weapon.name] = (stats.weaponUsage[card.weapon.name] ?? 0) + 1;
    this.setState('cardUsed');

    const turnEndScheduled = this.economy.consumeAction();

    const result: CardPlayResult = {
      slotIndex,
      card,
      damageDealt: applied.damageDealt,
      targetsHit: applied.targetsHit,
      combo,
      turnEndScheduled,
    };
    this.ctx.logger.info(pending.description);
    this.ctx.notify('CardPlayed', result);
    this.ctx.notify('CardPlayResult', { slotIndex, success: true, message: pending.description });
    return { ok: true, value: result };
  }

  private criticalFor(slotIndex: number, card: CardData): boolean {
    const rolled = this.criticalRolls.get(slotIndex);
    if (rolled !== undefined) return rolled;
    const critical = this.pipeline.rollCritical(card);
    this.criticalRolls.set(slotIndex, critical);
    return critical;
  }

  private rejected(slotIndex: number, rejection: Rejection): Rejection {
    this.ctx.notify('CardPlayResult', { slotIndex, success: false, message: rejection.message });
    return rejection;
  }

  private setState(next: HandState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    this.ctx.notify('HandStateChanged', { previous, state: next });
  }
}
