import type { EventBus } from '../engine/core/EventBus';
import { formatPosition } from '../engine/field/GridPosition';
import type { BattleEvent, BattleEventPayloads, BattleEventType, TargetSelection } from '../engine/types';

export type LogTone = 'info' | 'damage' | 'warning' | 'success';

export interface BattleLogEntry {
  turn: number;
  type: BattleEventType;
  text: string;
  tone: LogTone;
}

type Formatters = {
  [K in BattleEventType]?: (data: BattleEventPayloads[K]) => string;
};

function describeSelection(selection: TargetSelection): string {
  switch (selection.kind) {
    case 'none':
      return 'nothing';
    case 'column':
      return `column ${selection.column}`;
    case 'enemy':
      return `enemy at ${formatPosition(selection.position)}`;
  }
}

// Only events a player would want in the combat log; the rest are skipped.
const FORMATTERS: Formatters = {
  TurnChanged: (d) => `--- Turn ${d.turn} ---`,
  CardPlayed: (d) => {
    const combo = d.combo.completedCombos.length > 0 ? ` [${d.combo.completedCombos.join(', ')}]` : '';
    return `${d.card.displayName}: ${d.damageDealt} damage to ${d.targetsHit} target(s)${combo}`;
  },
  CardPlayResult: (d) => (d.success ? '' : `Slot ${d.slotIndex}: ${d.message}`),
  PendingDamageCalculated: (d) => `Preview: ${d.pending.description}`,
  EnemySpawned: (d) => `${d.enemy.name} appears at ${formatPosition(d.enemy.position)}`,
  EnemyDefeated: (d) => `${d.enemy.name} defeated`,
  GateDamaged: (d) => `Gate ${d.gate.gateId + 1} takes ${d.amount} (${d.gate.health}/${d.gate.maxHealth})`,
  GateDestroyed: (d) => `Gate ${d.gate.gateId + 1} destroyed! +${d.reward}`,
  GateEffectApplied: (d) => `Gate ${d.gateId + 1} uses ${d.effect} on ${d.affected} enemies`,
  PlayerDamaged: (d) => `Player takes ${d.amount} (HP ${d.health})`,
  ComboCompleted: (d) => `Combo ${d.combo}! x${d.damageMultiplier}`,
  ComboExpired: (d) => `Combo ${d.combo} expired`,
  ActionsExhausted: () => 'No actions left',
  TurnEnded: (d) => `Turn ended (${d.reason})`,
  TargetSelected: (d) => `Target: ${describeSelection(d.selection)}`,
  BattleEnded: (d) =>
    `${d.result.isVictory ? 'VICTORY' : 'DEFEAT'} (${d.result.condition}) after ${d.result.turnsUsed} turns`,
};

const TONES: Partial<Record<BattleEventType, LogTone>> = {
  PlayerDamaged: 'damage',
  EnemyDefeated: 'success',
  GateDestroyed: 'success',
  ComboCompleted: 'success',
  CardPlayResult: 'warning',
  ComboExpired: 'warning',
  ActionsExhausted: 'warning',
};

/** Text for one event, or null when the event is not shown in the log. */
export function formatBattleEvent<K extends BattleEventType>(event: BattleEvent<K>): string | null {
  const format = FORMATTERS[event.type];
  if (!format) return null;
  const text = format(event.data);
  return text.length > 0 ? text : null;
}

/**
 * Rolling combat log fed by the event bus. Newest entry first, capped at
 * `maxEntries`.
 */
export class BattleLog {
  private entries: BattleLogEntry[] = [];
  private unsubscribe: (() => void) | null = null;

  constructor(private readonly maxEntries: number = 50) {}

  attach(bus: EventBus): void {
    this.detach();
    this.unsubscribe = bus.subscribeAll((event) => this.record(event));
  }

  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  record(event: BattleEvent): BattleLogEntry | null {
    const text = formatBattleEvent(event);
    if (text === null) return null;

    const entry: BattleLogEntry = {
      turn: event.turn,
      type: event.type,
      text,
      tone: TONES[event.type] ?? 'info',
    };
    this.entries.unshift(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.length = this.maxEntries;
    }
    return entry;
  }

  getEntries(): BattleLogEntry[] {
    return [...this.entries];
  }

  /** `[T3] text` lines, oldest first. */
  toLines(): string[] {
    return [...this.entries].reverse().map((e) => `[T${e.turn}] ${e.text}`);
  }

  clear(): void {
    this.entries = [];
  }
}
