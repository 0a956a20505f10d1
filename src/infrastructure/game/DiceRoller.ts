// Infrastructure layer: Dice rolling RNG implementation
// Implements testable dice rolling with injectable random number generator

export interface DiceRoller {
  roll(sides: number): number;
}

function assertSides(sides: number): void {
  if (!Number.isInteger(sides) || sides < 1) {
    throw new Error(`Dice must have at least 1 side, got: ${sides}`);
  }
  if (sides > 1000) {
    throw new Error(`Dice cannot have more than 1000 sides, got: ${sides}`);
  }
}

/**
 * Standard random dice roller using Math.random()
 * Use in production
 */
export class RandomDiceRoller implements DiceRoller {
  roll(sides: number): number {
    assertSides(sides);
    return Math.floor(Math.random() * sides) + 1;
  }
}

/**
 * Seeded dice roller for reproducible runs
 * Linear congruential generator with the glibc constants
 */
export class SeededDiceRoller implements DiceRoller {
  private state: number;

  constructor(seed: number = Date.now()) {
    this.state = Math.trunc(seed) & 0x7fffffff;
  }

  roll(sides: number): number {
    assertSides(sides);
    this.state = (Math.imul(this.state, 1103515245) + 12345) & 0x7fffffff;
    return (this.state % sides) + 1;
  }
}

/**
 * Fixed dice roller for testing
 * Returns predetermined values from an array, one per die
 * Use in unit tests
 */
export class FixedDiceRoller implements DiceRoller {
  private values: number[];

  constructor(values: number[]) {
    this.values = [...values];
  }

  roll(sides: number): number {
    assertSides(sides);
    const value = this.values.shift();
    if (value === undefined) {
      throw new Error('FixedDiceRoller: No more values available');
    }
    if (value < 1 || value > sides) {
      throw new Error(`FixedDiceRoller: Value ${value} out of range for ${sides}-sided die`);
    }
    return value;
  }

  /**
   * Queue more values behind the remaining ones
   */
  push(...values: number[]): void {
    this.values.push(...values);
  }

  /**
   * Check how many values remain
   */
  get remaining(): number {
    return this.values.length;
  }
}
