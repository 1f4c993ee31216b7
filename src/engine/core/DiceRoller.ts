export interface DiceState {
  seed: number;
  callCount: number;
}

/** Seeded random source for one battle. Every random choice goes through here. */
export class DiceRoller {
  private seed: number;
  private initialSeed: number;
  private callCount: number = 0;

  constructor(seed: number) {
    this.seed = seed;
    this.initialSeed = seed;
  }

  // Mulberry32 PRNG - fast, good distribution
  private next(): number {
    this.callCount++;
    let t = (this.seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  // Integer in [0, max)
  nextInt(max: number): number {
    return Math.floor(this.next() * max);
  }

  // True with the given probability; always draws one roll
  chance(probability: number): boolean {
    return this.next() < probability;
  }

  // Uniform pick; undefined for an empty list (does not consume a roll)
  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[this.nextInt(items.length)];
  }

  get rollsMade(): number {
    return this.callCount;
  }

  getState(): DiceState {
    return {
      seed: this.initialSeed,
      callCount: this.callCount,
    };
  }

  // Replays the sequence up to the recorded call count
  setState(state: DiceState): void {
    this.seed = state.seed;
    this.initialSeed = state.seed;
    this.callCount = 0;
    for (let i = 0; i < state.callCount; i++) {
      this.next();
    }
  }
}
