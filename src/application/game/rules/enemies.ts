// Application layer: Enemy creation from campaign mob profiles

import type { ContentLookup } from '@/domain/content/registry.js';
import type { MobProfile } from '@/domain/content/types.js';
import type { DiceEngine, Enemy } from '@/domain/game/types.js';

function rollUnitHp(dice: DiceEngine, profile: MobProfile): number {
  if (!profile.hpExpr) {
    return profile.hp;
  }
  return Math.max(profile.hpMin, dice.rollExpression(profile.hpExpr).total);
}

function unitFromProfile(dice: DiceEngine, profile: MobProfile): Enemy {
  const hp = rollUnitHp(dice, profile);
  return {
    name: profile.name,
    hp,
    maxHp: hp,
    ac: profile.ac,
    attackBonus: profile.attackBonus,
    damage: profile.damage,
    asleep: false,
  };
}

/**
 * One unit per profile count, each with its own HP roll
 */
export function createEnemies(
  registry: ContentLookup,
  dice: DiceEngine,
  campaignId: string,
  name: string
): Enemy[] {
  const profile = registry.getMobProfile(campaignId, name);
  const enemies: Enemy[] = [];
  for (let i = 0; i < Math.max(1, profile.count); i++) {
    enemies.push(unitFromProfile(dice, profile));
  }
  return enemies;
}
