import type { DiceRoller } from '../core/DiceRoller';
import { GATE_TEMPLATES, gateTypeForLayout } from '../data/GateTemplates';
import type { GateType } from '../types';
import { Gate, type GateOverrides } from './Gate';
import type { EnemyInstance } from './EnemyInstance';
import { gridPosition, NO_POSITION, positionKey, type GridPosition } from './GridPosition';

export const ROW_COUNT = 2;

export interface GateDamageResult {
  dealt: number;
  destroyed: boolean;
}

/**
 * Two rows of enemies in front of one gate per column. Row 0 is the front row.
 * Occupancy is keyed by position; dead enemies stay until removed.
 */
export class GridField {
  readonly columnCount: number;
  private readonly dice: DiceRoller;
  private cells: Map<string, EnemyInstance> = new Map();
  private gates: Gate[];

  constructor(columnCount: number, dice: DiceRoller, gateOverrides: GateOverrides[] = []) {
    if (!Number.isInteger(columnCount) || columnCount < 1) {
      throw new Error(`Invalid column count: ${columnCount}`);
    }
    this.columnCount = columnCount;
    this.dice = dice;
    this.gates = Array.from({ length: columnCount }, (_, column) => {
      const gateType = gateTypeForLayout(column, columnCount);
      return new Gate(column, column, GATE_TEMPLATES[gateType], gateOverrides[column]);
    });
  }

  // Positions

  isValidPosition(position: GridPosition): boolean {
    return (
      Number.isInteger(position.column) &&
      Number.isInteger(position.row) &&
      position.column >= 0 &&
      position.column < this.columnCount &&
      position.row >= 0 &&
      position.row < ROW_COUNT
    );
  }

  isOccupied(position: GridPosition): boolean {
    return this.cells.has(positionKey(position));
  }

  enemyAt(position: GridPosition): EnemyInstance | undefined {
    return this.cells.get(positionKey(position));
  }

  placeEnemy(enemy: EnemyInstance, position: GridPosition): boolean {
    if (!this.isValidPosition(position) || this.isOccupied(position)) {
      return false;
    }
    enemy.position = gridPosition(position.column, position.row);
    this.cells.set(positionKey(position), enemy);
    return true;
  }

  removeEnemy(position: GridPosition): boolean {
    if (!this.isValidPosition(position)) return false;
    const enemy = this.cells.get(positionKey(position));
    if (!enemy) return false;
    this.cells.delete(positionKey(position));
    enemy.position = NO_POSITION;
    return true;
  }

  /** Uniform over free cells; NO_POSITION when the grid is full. */
  randomEmptyPosition(): GridPosition {
    const free: GridPosition[] = [];
    for (let row = 0; row < ROW_COUNT; row++) {
      for (let column = 0; column < this.columnCount; column++) {
        const position = gridPosition(column, row);
        if (!this.isOccupied(position)) free.push(position);
      }
    }
    return this.dice.pick(free) ?? NO_POSITION;
  }

  // Enemy queries (living only)

  frontEnemyInColumn(column: number): EnemyInstance | undefined {
    for (let row = 0; row < ROW_COUNT; row++) {
      const enemy = this.enemyAt(gridPosition(column, row));
      if (enemy?.isAlive()) return enemy;
    }
    return undefined;
  }

  enemiesInColumn(column: number): EnemyInstance[] {
    const result: EnemyInstance[] = [];
    for (let row = 0; row < ROW_COUNT; row++) {
      const enemy = this.enemyAt(gridPosition(column, row));
      if (enemy?.isAlive()) result.push(enemy);
    }
    return result;
  }

  enemiesInRow(row: number): EnemyInstance[] {
    const result: EnemyInstance[] = [];
    for (let column = 0; column < this.columnCount; column++) {
      const enemy = this.enemyAt(gridPosition(column, row));
      if (enemy?.isAlive()) result.push(enemy);
    }
    return result;
  }

  /** Row-major, front row first. */
  allEnemies(): EnemyInstance[] {
    const result: EnemyInstance[] = [];
    for (let row = 0; row < ROW_COUNT; row++) {
      result.push(...this.enemiesInRow(row));
    }
    return result;
  }

  aliveEnemyCount(): number {
    return this.allEnemies().length;
  }

  enemiesOfGate(gateId: number): EnemyInstance[] {
    return this.allEnemies().filter((e) => e.assignedGateId === gateId);
  }

  // Gates

  gateInColumn(column: number): Gate | undefined {
    return this.gates.find((g) => g.column === column);
  }

  gate(gateId: number): Gate | undefined {
    return this.gates.find((g) => g.gateId === gateId);
  }

  allGates(): readonly Gate[] {
    return this.gates;
  }

  aliveGates(): Gate[] {
    return this.gates.filter((g) => !g.isDestroyed());
  }

  aliveGateCount(): number {
    return this.aliveGates().length;
  }

  allGatesDestroyed(): boolean {
    return this.gates.every((g) => g.isDestroyed());
  }

  gateTypes(): GateType[] {
    return this.gates.map((g) => g.gateType);
  }

  /** A gate is only exposed once nothing alive stands in front of it. */
  canAttackGate(column: number): boolean {
    const gate = this.gateInColumn(column);
    if (!gate || gate.isDestroyed()) return false;
    return this.enemiesInColumn(column).length === 0;
  }

  damageGate(column: number, amount: number): GateDamageResult {
    const gate = this.gateInColumn(column);
    if (!gate || gate.isDestroyed()) return { dealt: 0, destroyed: false };
    const dealt = gate.takeDamage(amount);
    return { dealt, destroyed: gate.isDestroyed() };
  }

  reset(): void {
    for (const enemy of this.cells.values()) {
      enemy.position = NO_POSITION;
    }
    this.cells.clear();
    for (const gate of this.gates) {
      gate.reset();
    }
  }
}
