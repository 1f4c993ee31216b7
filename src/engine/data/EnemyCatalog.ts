import { z } from 'zod/v4';
import type { EnemyData, GateType } from '../types';
import enemiesJson from './catalogs/enemies.json';
import { EnemyDataSchema } from './schemas';

/** Enemy summoned by a gate whose pool is empty or unresolvable. */
export const DEFAULT_ENEMY_ID_BY_GATE: Record<GateType, number> = {
  standard: 100,
  elite: 101,
  support: 102,
  summoner: 103,
  fortress: 104,
};

export class EnemyCatalog {
  private entries: Map<number, EnemyData> = new Map();

  constructor(enemies: EnemyData[] = []) {
    for (const enemy of enemies) {
      this.register(enemy);
    }
  }

  /** Catalog with the bundled enemies. */
  static bundled(): EnemyCatalog {
    return new EnemyCatalog(parseEnemyCatalog(enemiesJson));
  }

  register(enemy: EnemyData): void {
    this.entries.set(enemy.id, enemy);
  }

  get(id: number): EnemyData | undefined {
    return this.entries.get(id);
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  all(): EnemyData[] {
    return [...this.entries.values()];
  }

  defaultForGate(gateType: GateType): EnemyData | undefined {
    return this.entries.get(DEFAULT_ENEMY_ID_BY_GATE[gateType]);
  }
}

export function parseEnemyCatalog(raw: unknown): EnemyData[] {
  const enemies = z.array(EnemyDataSchema).parse(raw);
  const seen = new Set<number>();
  for (const enemy of enemies) {
    if (seen.has(enemy.id)) {
      throw new Error(`Duplicate enemy id in catalog: ${enemy.id}`);
    }
    seen.add(enemy.id);
  }
  return enemies;
}
