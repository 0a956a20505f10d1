// Infrastructure layer: zod schemas for content files

import { z } from 'zod';

export const statNameSchema = z.enum(['STR', 'DEX', 'CON', 'INT', 'WIS', 'CHA']);

const slotSchema = z.enum(['head', 'arms', 'hands', 'chest', 'legs', 'feet']);

export const itemEffectSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('heal'), dice: z.string().min(1) }),
  z.object({ type: z.literal('ac'), bonus: z.number().int() }),
]);

const itemBase = {
  id: z.string().min(1),
  name: z.string().min(1),
  countsTowardLimit: z.boolean().default(true),
  effect: itemEffectSchema.nullable().default(null),
};

export const itemSchema = z.discriminatedUnion('kind', [
  z.object({ ...itemBase, kind: z.literal('potion') }),
  z.object({ ...itemBase, kind: z.literal('armor'), slot: slotSchema }),
  z.object({ ...itemBase, kind: z.literal('quest') }),
  z.object({ ...itemBase, kind: z.literal('misc') }),
  z.object({ ...itemBase, kind: z.literal('unknown') }),
]);

const roomBase = {
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
};

const roomSchema = z.discriminatedUnion('kind', [
  z.object({
    ...roomBase,
    kind: z.literal('social'),
    npc: z.string().nullable().default(null),
    social: z.object({
      stat: statNameSchema,
      dc: z.number().int(),
      successFlag: z.string().optional(),
      successMessage: z.string().optional(),
      failMessage: z.string().optional(),
      doneFlag: z.string().default('social_done'),
    }),
  }),
  z.object({ ...roomBase, kind: z.literal('combat'), enemy: z.string().min(1) }),
  z.object({
    ...roomBase,
    kind: z.literal('loot'),
    loot: z.object({
      stat: statNameSchema,
      dc: z.number().int(),
      winItemId: z.string().optional(),
      endsCampaign: z.boolean().default(true),
      successMessage: z.string().optional(),
      failMessage: z.string().optional(),
    }),
  }),
  z.object({ ...roomBase, kind: z.literal('passage') }),
]);

const mobSchema = z.object({
  name: z.string().min(1),
  hp: z.number().int().default(1),
  hpExpr: z.string().optional(),
  hpMin: z.number().int().default(1),
  count: z.number().int().min(1).default(1),
  ac: z.number().int().default(10),
  attackBonus: z.number().int().default(0),
  damage: z.string().default('1d4'),
  loot: z
    .object({
      gold: z.string().optional(),
      items: z.array(z.string()).default([]),
    })
    .default({ items: [] }),
  ai: z.enum(['focus_player', 'focus_companion', 'focus_weakest']).default('focus_weakest'),
  xp: z.number().int().min(0).default(0),
});

const companionSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  hp: z.number().int(),
  maxHp: z.number().int(),
  ac: z.number().int(),
  attackBonus: z.number().int(),
  damage: z.string(),
  defendHpThreshold: z.number().int().default(3),
  mana: z.number().int().default(0),
  maxMana: z.number().int().default(0),
  spells: z.array(z.string()).default([]),
});

export const campaignSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  roomOrder: z.array(z.string()).min(1),
  rooms: z.record(roomSchema),
  items: z.record(itemSchema),
  mobs: z.record(mobSchema),
  companions: z.record(companionSchema).default({}),
  defaultCompanionIds: z.array(z.string()).default([]),
  exits: z.record(z.record(z.string())).default({}),
  completionXp: z.number().int().min(0).default(0),
  defeatLine: z.string().optional(),
});

const classSchema = z.object({
  name: z.string().min(1),
  role: z.enum(['caster', 'melee']),
  description: z.string().default(''),
  baseHp: z.number().int(),
  baseAc: z.number().int(),
  attackBonus: z.number().int(),
  damage: z.string(),
  hpPerLevel: z.number().int().default(1),
  spells: z.array(z.string()).default([]),
  learnableSpells: z.array(z.string()).default([]),
  manaStat: statNameSchema.default('INT'),
  special: z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('power'), damageBonus: z.number().int(), flavor: z.string() }),
    z.object({ kind: z.literal('precision'), attackBonus: z.number().int(), flavor: z.string() }),
    z.object({ kind: z.literal('spell') }),
  ]),
});

const raceSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  statMods: z.record(statNameSchema, z.number().int()).default({}),
});

const spellSchema = z.object({
  name: z.string().min(1),
  damage: z.string().optional(),
  mana: z.number().int().min(0),
});

export const rulesSchema = z.object({
  classes: z.record(classSchema),
  races: z.record(raceSchema),
  spells: z.record(spellSchema),
});
