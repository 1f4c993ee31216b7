import { EnemyInstance } from '../field/EnemyInstance';
import type { EnemyData } from '../types';

/**
 * Builds enemy instances with ids unique to one battle (`enemy_1`, `enemy_2`, ...).
 * Owned by the session so two battles never share a counter.
 */
export class EnemyFactory {
  private counter = 0;

  create(data: EnemyData, assignedGateId: number): EnemyInstance {
    this.counter += 1;
    return new EnemyInstance(`enemy_${this.counter}`, data, assignedGateId);
  }

  get createdCount(): number {
    return this.counter;
  }

  reset(): void {
    this.counter = 0;
  }
}
