import { describe, expect, it } from 'vitest';
import { FixedDiceRoller, SeededDiceRoller } from '@/infrastructure/game/DiceRoller.js';
import { ContentIntegrityError } from '@/utils/errors.js';
import { Dice, formatSigned } from './dice.js';

function diceWith(...values: number[]): Dice {
  return new Dice(new FixedDiceRoller(values));
}

describe('Dice.rollExpression', () => {
  it('applies a negative modifier', () => {
    const roll = diceWith(4).rollExpression('1d4-1');
    expect(roll).toEqual({ formula: '1d4-1', rolls: [4], modifier: -1, total: 3, detail: '4-1' });
  });

  it('sums several dice and a bonus', () => {
    const roll = diceWith(2, 5).rollExpression('2d6+3');
    expect(roll.total).toBe(10);
    expect(roll.detail).toBe('2+5+3');
  });

  it('reads a missing count as one die', () => {
    const roll = diceWith(12).rollExpression('d20');
    expect(roll.rolls).toEqual([12]);
    expect(roll.detail).toBe('12');
  });

  it('ignores whitespace', () => {
    expect(diceWith(3).rollExpression(' 1d6 + 2 ').formula).toBe('1d6+2');
  });

  it('treats a plain integer as a fixed value without rolling', () => {
    const roller = new FixedDiceRoller([]);
    const roll = new Dice(roller).rollExpression('7');
    expect(roll.total).toBe(7);
    expect(roll.rolls).toEqual([]);
    expect(roll.detail).toBe('7');
  });

  it('rejects malformed expressions', () => {
    const dice = diceWith();
    expect(() => dice.rollExpression('banana')).toThrow(ContentIntegrityError);
    expect(() => dice.rollExpression('0d6')).toThrow(ContentIntegrityError);
    expect(() => dice.rollExpression('1d6+')).toThrow(ContentIntegrityError);
  });
});

describe('Dice.check', () => {
  it('succeeds when the total meets the DC', () => {
    expect(diceWith(11).check(2, 13)).toEqual({ success: true, roll: 11, total: 13 });
  });

  it('fails one short of the DC', () => {
    expect(diceWith(10).check(2, 13)).toEqual({ success: false, roll: 10, total: 12 });
  });
});

describe('FixedDiceRoller', () => {
  it('refuses a value the die cannot show', () => {
    expect(() => new FixedDiceRoller([7]).roll(6)).toThrow('out of range');
  });

  it('throws once the script runs out', () => {
    const roller = new FixedDiceRoller([1]);
    roller.roll(4);
    expect(roller.remaining).toBe(0);
    expect(() => roller.roll(4)).toThrow('No more values');
  });
});

describe('SeededDiceRoller', () => {
  it('replays the same rolls from the same seed', () => {
    const first = new SeededDiceRoller(42);
    const second = new SeededDiceRoller(42);
    const rolls = [first.roll(20), first.roll(20), first.roll(20)];
    expect(rolls).toEqual([8, 5, 14]);
    expect([second.roll(20), second.roll(20), second.roll(20)]).toEqual(rolls);
  });

  it('keeps a long run inside the die', () => {
    const roller = new SeededDiceRoller(7);
    for (let i = 0; i < 200; i++) {
      const value = roller.roll(6);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(6);
    }
  });

  it('rejects a die without sides', () => {
    expect(() => new SeededDiceRoller(1).roll(0)).toThrow('Dice must have at least 1 side, got: 0');
  });
});

describe('formatSigned', () => {
  it('always carries a sign', () => {
    expect(formatSigned(2)).toBe('+2');
    expect(formatSigned(0)).toBe('+0');
    expect(formatSigned(-3)).toBe('-3');
  });
});
