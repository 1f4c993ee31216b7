import type { BattleContext } from '../core/BattleContext';
import { formatPosition, gridPosition, type GridPosition } from '../field/GridPosition';
import { reject, type Outcome, type TargetSelection } from '../types';

const NONE: TargetSelection = { kind: 'none' };

export interface TargetSelectorHooks {
  /** Runs before the selection changes, e.g. to drop a preview aimed at the old target */
  beforeChange?: () => void;
  afterChange?: () => void;
}

export class TargetSelector {
  private current: TargetSelection = NONE;
  private last: TargetSelection = NONE;

  constructor(
    private readonly ctx: BattleContext,
    private readonly hooks: TargetSelectorHooks = {}
  ) {}

  getSelection(): TargetSelection {
    return this.current;
  }

  getLastSelection(): TargetSelection {
    return this.last;
  }

  selectColumn(column: number): Outcome<TargetSelection> {
    if (!Number.isInteger(column) || column < 0 || column >= this.ctx.field.columnCount) {
      return reject('invalidInput', `Column ${column} is out of range`);
    }
    return { ok: true, value: this.set({ kind: 'column', column }) };
  }

  selectEnemy(position: GridPosition): Outcome<TargetSelection> {
    const { field } = this.ctx;
    if (!field.isValidPosition(position)) {
      return reject('invalidInput', `Position ${formatPosition(position)} is off the grid`);
    }
    if (!field.enemyAt(position)?.isAlive()) {
      return reject('resolutionFailure', `No enemy at ${formatPosition(position)}`);
    }
    return {
      ok: true,
      value: this.set({ kind: 'enemy', column: position.column, position: gridPosition(position.column, position.row) }),
    };
  }

  /** Re-apply the previous selection, validated against the current field. */
  reselectLast(): Outcome<TargetSelection> {
    const last = this.last;
    switch (last.kind) {
      case 'none':
        return reject('statePrecondition', 'No previous target to reselect');
      case 'column':
        return this.selectColumn(last.column);
      case 'enemy':
        return this.selectEnemy(last.position);
    }
  }

  clear(): boolean {
    if (this.current.kind === 'none') return false;
    this.hooks.beforeChange?.();
    this.current = NONE;
    this.ctx.notify('TargetCleared', {});
    this.hooks.afterChange?.();
    return true;
  }

  reset(): void {
    this.current = NONE;
    this.last = NONE;
  }

  private set(selection: TargetSelection): TargetSelection {
    this.hooks.beforeChange?.();
    this.current = selection;
    this.last = selection;
    this.ctx.notify('TargetSelected', { selection });
    this.hooks.afterChange?.();
    return selection;
  }
}
