// Application layer: Dice expressions and d20 checks

import type { CheckResult, DiceEngine, DiceRoll } from '@/domain/game/types.js';
import type { DiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { RandomDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { ContentIntegrityError } from '@/utils/errors.js';

const DICE_PATTERN = /^(\d*)d(\d+)([+-]\d+)?$/i;
const LITERAL_PATTERN = /^[+-]?\d+$/;

export function formatSigned(value: number): string {
  return value >= 0 ? `+${value}` : `${value}`;
}

/**
 * Evaluates "NdM", "NdM+B", "NdM-B" and plain integers over a DiceRoller.
 * Every draw goes through the roller, so a FixedDiceRoller makes results exact.
 */
export class Dice implements DiceEngine {
  constructor(private readonly roller: DiceRoller = new RandomDiceRoller()) {}

  rollDie(sides: number): number {
    return this.roller.roll(sides);
  }

  rollExpression(expr: string): DiceRoll {
    const formula = expr.replace(/\s+/g, '');

    if (LITERAL_PATTERN.test(formula)) {
      const value = parseInt(formula, 10);
      return { formula, rolls: [], modifier: value, total: value, detail: String(value) };
    }

    const match = DICE_PATTERN.exec(formula);
    if (!match) {
      throw new ContentIntegrityError(`Malformed dice expression: "${expr}"`);
    }

    const count = match[1] ? parseInt(match[1], 10) : 1;
    const sides = parseInt(match[2], 10);
    const modifier = match[3] ? parseInt(match[3], 10) : 0;
    if (count < 1 || sides < 1) {
      throw new ContentIntegrityError(`Malformed dice expression: "${expr}"`);
    }

    const rolls: number[] = [];
    for (let i = 0; i < count; i++) {
      rolls.push(this.rollDie(sides));
    }
    const total = rolls.reduce((sum, r) => sum + r, 0) + modifier;
    let detail = rolls.join('+');
    if (modifier) {
      detail += formatSigned(modifier);
    }
    return { formula, rolls, modifier, total, detail };
  }

  check(statBonus: number, dc: number): CheckResult {
    const roll = this.rollDie(20);
    const total = roll + statBonus;
    return { success: total >= dc, roll, total };
  }
}
