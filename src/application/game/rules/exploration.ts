// Application layer: Exploration
// Room entry, movement and the per-room-kind actions

import type { CombatRoom, LootRoom, PassageRoom, Room, SocialRoom } from '@/domain/content/types.js';
import type { ActionOutcome, RoomVerb, RulesContext } from '@/domain/game/session.js';
import { createEnemies } from './enemies.js';
import { isRoomDefeated, setQuestFlag } from './flags.js';
import { addItemToInventory, rollLoot } from './inventory.js';

const TALK_VERBS: readonly RoomVerb[] = ['talk', 'speak', 'parley', 'approach'];
const MOVE_VERBS: readonly RoomVerb[] = ['leave', 'move', 'continue', 'go'];
const LOOT_ROOM_VERBS: readonly RoomVerb[] = ['search', 'open', 'loot', 'inspect'];
const LOOK_VERBS: readonly RoomVerb[] = ['search', 'inspect', 'look'];

function fillTemplate(template: string, roll: number, total: number): string {
  return template.replace(/\{roll\}/g, String(roll)).replace(/\{total\}/g, String(total));
}

function lowerFirst(text: string): string {
  return text.charAt(0).toLowerCase() + text.slice(1);
}

/**
 * Marks the room visited; an undefeated combat room starts a fight
 */
export function startRoom(ctx: RulesContext, room: Room): string {
  const { state } = ctx;
  if (!state.visited.includes(room.id)) {
    state.visited.push(room.id);
  }
  if (room.kind === 'combat' && !isRoomDefeated(state, room.id)) {
    if (state.enemies.length === 0) {
      state.enemies = createEnemies(ctx.registry, ctx.dice, state.campaignId, room.enemy);
    }
    state.inCombat = true;
    return `A fight breaks out with ${room.enemy}.`;
  }
  return room.description;
}

function socialAction(ctx: RulesContext, room: SocialRoom, verb: RoomVerb): string {
  const { state, dice } = ctx;
  const config = room.social;
  if (TALK_VERBS.includes(verb)) {
    const { success, roll, total } = dice.check(state.player.stats[config.stat], config.dc);
    setQuestFlag(state, config.doneFlag);
    if (success && config.successFlag) {
      setQuestFlag(state, config.successFlag);
    }
    const template = success ? config.successMessage : config.failMessage;
    if (template) return fillTemplate(template, roll, total);
    return success ? `You succeed (roll ${roll} -> ${total}).` : `You fail (roll ${roll} -> ${total}).`;
  }
  if (MOVE_VERBS.includes(verb)) {
    return 'You prepare to move on.';
  }
  return `${room.npc ?? 'Someone'} waits, watching for your move.`;
}

function lootRoomAction(ctx: RulesContext, room: LootRoom, verb: RoomVerb): string {
  const { state, dice, registry } = ctx;
  const config = room.loot;
  if (LOOT_ROOM_VERBS.includes(verb)) {
    if (state.flags.lootTaken.includes(room.id)) {
      return 'The chest is already open and empty.';
    }
    const { success, roll, total } = dice.check(state.player.stats[config.stat], config.dc);
    if (!success) {
      if (!state.flags.lootFailed.includes(room.id)) state.flags.lootFailed.push(room.id);
      return config.failMessage
        ? fillTemplate(config.failMessage, roll, total)
        : `Your tools slip (roll ${roll} -> ${total}). The lock resists for now.`;
    }

    let blocked: string | null = null;
    if (config.winItemId) {
      const added = addItemToInventory(state, registry.itemFromId(state.campaignId, config.winItemId));
      if (!added.consumed) {
        blocked = `You force the lock (roll ${roll} -> ${total}) but ${lowerFirst(added.message)} The prize is lost to the rubble.`;
      }
    }
    state.flags.lootTaken.push(room.id);
    if (config.endsCampaign) {
      state.gameOver = true;
    }
    if (blocked) return blocked;
    return config.successMessage
      ? fillTemplate(config.successMessage, roll, total)
      : `You work the lock free (roll ${roll} -> ${total}).`;
  }
  if (MOVE_VERBS.includes(verb)) {
    return "There's nowhere left to go but the chest.";
  }
  return 'Wind whistles through the spire. The chest waits.';
}

function lootCorpses(ctx: RulesContext, room: CombatRoom, token: string): string {
  const { state, registry, dice } = ctx;
  const corpses = state.flags.corpses[room.id] ?? [];
  if (corpses.length === 0) return 'Nothing here to loot.';
  let selected = corpses.filter((corpse) => !corpse.looted);
  if (selected.length === 0) return 'You already searched the corpses.';

  const target = token.trim().toLowerCase();
  if (/^\d+$/.test(target)) {
    const corpse = selected[parseInt(target, 10) - 1];
    if (!corpse) return 'That corpse does not exist.';
    selected = [corpse];
  } else if (target && target !== 'all') {
    const matches = selected.filter((corpse) => corpse.name.toLowerCase().includes(target));
    if (matches.length === 0) return 'No such corpse.';
    if (matches.length > 1) return 'Be more specific.';
    selected = matches;
  } else if (!target && selected.length > 1) {
    return "Multiple corpses here. Use 'loot <number>' or 'loot all'.";
  }

  let gold = 0;
  const itemTexts: string[] = [];
  for (const corpse of selected) {
    const loot = rollLoot(registry, dice, state.campaignId, corpse.name);
    gold += loot.gold;
    if (loot.itemId) {
      const item = registry.itemFromId(state.campaignId, loot.itemId);
      const added = addItemToInventory(state, item);
      itemTexts.push(
        added.consumed
          ? `You find ${item.name}.`
          : `You spot ${item.name}, but ${lowerFirst(added.message)}`
      );
    }
    corpse.looted = true;
  }
  state.player.gold += gold;

  if (gold === 0 && itemTexts.length === 0) {
    return 'You search the corpse but find nothing.';
  }
  const suffix = itemTexts.length > 0 ? ` ${itemTexts.join(' ')}` : '';
  return `You loot the corpse and gain ${gold} gold.${suffix}`;
}

function combatRoomAction(ctx: RulesContext, room: CombatRoom, verb: RoomVerb, target: string): string {
  if (!isRoomDefeated(ctx.state, room.id)) {
    return 'The enemy blocks your way, ready to strike.';
  }
  if (verb === 'loot') {
    return lootCorpses(ctx, room, target);
  }
  if (verb === 'search' || verb === 'inspect') {
    return `You search the ${room.name.toLowerCase()}. Most supplies are rotted or picked clean.`;
  }
  return 'The room falls silent after the fight.';
}

function passageAction(room: PassageRoom, verb: RoomVerb): string {
  return LOOK_VERBS.includes(verb) ? room.description : 'You press onward.';
}

function roomMessage(ctx: RulesContext, room: Room, verb: RoomVerb, target: string): string {
  switch (room.kind) {
    case 'social':
      return socialAction(ctx, room, verb);
    case 'loot':
      return lootRoomAction(ctx, room, verb);
    case 'combat':
      return combatRoomAction(ctx, room, verb, target);
    case 'passage':
      return passageAction(room, verb);
  }
}

/**
 * Dispatch on the current room's kind; every room action takes a turn
 */
export function applyRoomAction(ctx: RulesContext, verb: RoomVerb, target = ''): ActionOutcome {
  const room = ctx.registry.getRoom(ctx.state.campaignId, ctx.state.roomId);
  return { consumed: true, message: roomMessage(ctx, room, verb, target) };
}

/**
 * Exit key first, then destination room id
 */
export function movePlayer(ctx: RulesContext, destination: string): ActionOutcome {
  const { state, registry } = ctx;
  const exits = registry.getExits(state.campaignId, state.roomId);
  const token = destination.trim().toLowerCase();
  const roomId = exits[token] ?? Object.values(exits).find((value) => value === token);

  if (!roomId) {
    const options = [...new Set(Object.values(exits))].sort();
    return {
      consumed: false,
      message:
        options.length > 0
          ? `Can't go that way. Options: ${options.join(', ')}.`
          : "There's nowhere to go from here.",
    };
  }
  state.roomId = roomId;
  return { consumed: true, message: startRoom(ctx, registry.getRoom(state.campaignId, roomId)) };
}
