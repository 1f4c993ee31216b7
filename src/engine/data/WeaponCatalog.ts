import { z } from 'zod/v4';
import type { WeaponData } from '../types';
import weaponsJson from './catalogs/weapons.json';
import { WeaponDataSchema } from './schemas';

export function parseWeaponCatalog(raw: unknown): WeaponData[] {
  return z.array(WeaponDataSchema).parse(raw);
}

export class WeaponCatalog {
  private byName: Map<string, WeaponData> = new Map();

  constructor(weapons: WeaponData[]) {
    for (const weapon of weapons) {
      if (this.byName.has(weapon.name)) {
        throw new Error(`Duplicate weapon in catalog: ${weapon.name}`);
      }
      this.byName.set(weapon.name, weapon);
    }
  }

  static bundled(): WeaponCatalog {
    return new WeaponCatalog(parseWeaponCatalog(weaponsJson));
  }

  get(name: string): WeaponData | undefined {
    return this.byName.get(name);
  }

  all(): WeaponData[] {
    return [...this.byName.values()];
  }

  /** Resolve a loadout by weapon names; throws on an unknown name. */
  loadout(names: string[]): WeaponData[] {
    return names.map((name) => {
      const weapon = this.byName.get(name);
      if (!weapon) {
        throw new Error(`Unknown weapon: ${name}`);
      }
      return weapon;
    });
  }
}

export const DEFAULT_LOADOUT = ['Flame Sword', 'Frost Spear', 'Thunder Bow', 'Gale Axe'];
