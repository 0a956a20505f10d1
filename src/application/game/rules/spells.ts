// Application layer: Spell lookups and level-up spell choices

import type { ContentLookup } from '@/domain/content/registry.js';
import type { ClassProfile, SpellProfile } from '@/domain/content/types.js';

/** Best first */
export const DAMAGE_SPELL_PREFERENCE: readonly string[] = ['Magic Missile', 'Spark'];

export interface DamageSpell extends SpellProfile {
  damage: string;
}

export function asDamageSpell(spell: SpellProfile | undefined): DamageSpell | null {
  if (!spell || !spell.damage) {
    return null;
  }
  return { ...spell, damage: spell.damage };
}

export function bestDamageSpell(registry: ContentLookup, learned: string[]): DamageSpell | null {
  for (const name of DAMAGE_SPELL_PREFERENCE) {
    if (!learned.includes(name)) continue;
    const spell = asDamageSpell(registry.getSpell(name));
    if (spell) return spell;
  }
  return null;
}

/**
 * Choices open at even levels from 2 up, minus spells already known
 */
export function spellChoicesForLevel(
  profile: ClassProfile,
  level: number,
  learned: string[]
): string[] {
  if (profile.learnableSpells.length === 0) return [];
  if (level < 2 || level % 2 !== 0) return [];
  return profile.learnableSpells.filter((spell) => !learned.includes(spell));
}
