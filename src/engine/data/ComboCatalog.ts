import { z } from 'zod/v4';
import type { ComboDefinition } from '../types';
import combosJson from './catalogs/combos.json';
import { ComboDefinitionSchema } from './schemas';

export function parseComboCatalog(raw: unknown): ComboDefinition[] {
  const combos = z.array(ComboDefinitionSchema).parse(raw);
  const names = new Set<string>();
  for (const combo of combos) {
    if (names.has(combo.name)) {
      throw new Error(`Duplicate combo in catalog: ${combo.name}`);
    }
    names.add(combo.name);
  }
  return combos;
}

export function bundledCombos(): ComboDefinition[] {
  return parseComboCatalog(combosJson);
}
