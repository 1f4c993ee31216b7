import { readFileSync } from 'node:fs';
import type { z } from 'zod/v4';
import { BattleConfigSchema } from './schemas';

export type BattleConfig = z.infer<typeof BattleConfigSchema>;
export type BattleConfigInput = z.input<typeof BattleConfigSchema>;

/** Validate a raw config; missing fields take their defaults. Throws on invalid input. */
export function parseBattleConfig(raw: unknown = {}): BattleConfig {
  return BattleConfigSchema.parse(raw);
}

export function loadBattleConfigFile(path: string): BattleConfig {
  return parseBattleConfig(JSON.parse(readFileSync(path, 'utf-8')));
}

export const DEFAULT_BATTLE_CONFIG: BattleConfig = parseBattleConfig();
