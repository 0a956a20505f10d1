// Domain layer: Game entity types
// NO external dependencies - pure TypeScript

export type StatName = 'STR' | 'DEX' | 'CON' | 'INT' | 'WIS' | 'CHA';

export type Stats = Record<StatName, number>;

// Result types
export interface DiceRoll {
  formula: string;
  rolls: number[];
  modifier: number;
  total: number;
  /** Human readable breakdown, e.g. "4+1-1" */
  detail: string;
}

export interface CheckResult {
  success: boolean;
  roll: number;
  total: number;
}

/**
 * Anything that can trade blows
 */
export interface Combatant {
  name: string;
  hp: number;
  maxHp: number;
  ac: number;
  attackBonus: number;
  damage: string;
}

export interface Character extends Combatant {
  race: string;
  className: string;
  stats: Stats;
  baseAc: number;
  mana: number;
  maxMana: number;
  gold: number;
  xp: number;
  level: number;
  learnedSpells: string[];
}

export interface Companion extends Combatant {
  id: string;
  mana: number;
  maxMana: number;
  learnedSpells: string[];
  defendHpThreshold: number;
}

export interface Enemy extends Combatant {
  asleep: boolean;
}

/**
 * Dice port - every random draw in the rules goes through this
 */
export interface DiceEngine {
  rollDie(sides: number): number;
  rollExpression(expr: string): DiceRoll;
  check(statBonus: number, dc: number): CheckResult;
}
