// Application layer: Exploration state implementation
// Room actions, movement, rest and gear outside of combat

import type {
  ActionOutcome,
  ExplorationCommand,
  IGameState,
  RoomVerb,
  RulesContext,
} from '@/domain/game/session.js';
import { parseUse, tokenize } from '@/application/game/commands/parse.js';
import { applyRoomAction, movePlayer } from '@/application/game/rules/exploration.js';
import { equipItem, unequipItem, useItem } from '@/application/game/rules/inventory.js';
import { applyRest } from '@/application/game/rules/rest.js';

export const MAX_REST_COUNT = 20;

const ROOM_VERBS: readonly RoomVerb[] = [
  'talk',
  'speak',
  'parley',
  'approach',
  'search',
  'open',
  'inspect',
  'look',
  'loot',
  'leave',
  'continue',
];

const DIRECTIONS = ['up', 'down', 'north', 'south', 'east', 'west', 'back'];

function asRoomVerb(word: string): RoomVerb | null {
  return ROOM_VERBS.find((verb) => verb === word) ?? null;
}

export class ExplorationState implements IGameState<ExplorationCommand> {
  readonly name = 'exploration' as const;
  readonly usage =
    'Try: talk, search, loot [number|all|name], move <destination>, rest [count], use <item> [on <target>], equip <item>, unequip <slot>.';

  readonly actions = ['talk', 'search', 'loot', 'move', 'rest', 'use', 'equip', 'unequip'] as const;

  constructor(private readonly maxRestCount: number = MAX_REST_COUNT) {}

  parse(input: string): ExplorationCommand | null {
    const tokens = tokenize(input);
    const { verb, rest } = tokens;
    if (!verb) return null;

    const use = parseUse(tokens);
    if (use) return use;

    if (verb === 'move' || verb === 'go') {
      return { type: 'move', destination: rest || null };
    }
    if (DIRECTIONS.includes(verb) && !rest) {
      return { type: 'move', destination: verb };
    }
    if (verb === 'rest') {
      // Out-of-range counts clamp; anything else rests once
      const count = /^-?\d+$/.test(rest) ? parseInt(rest, 10) : 1;
      return { type: 'rest', count: Math.max(1, Math.min(this.maxRestCount, count)) };
    }
    if (verb === 'equip') {
      return rest ? { type: 'equip', query: rest } : null;
    }
    if (verb === 'unequip') {
      return rest ? { type: 'unequip', slot: rest } : null;
    }

    const roomVerb = asRoomVerb(verb);
    return roomVerb ? { type: 'room', verb: roomVerb, target: rest } : null;
  }

  handle(command: ExplorationCommand, ctx: RulesContext): ActionOutcome {
    switch (command.type) {
      case 'room':
        return applyRoomAction(ctx, command.verb, command.target);
      case 'move':
        return command.destination === null
          ? applyRoomAction(ctx, 'move')
          : movePlayer(ctx, command.destination);
      case 'rest':
        return this.rest(ctx, command.count);
      case 'equip':
        return equipItem(ctx.state, command.query);
      case 'unequip':
        return unequipItem(ctx.state, command.slot);
      case 'use':
        return useItem(ctx.state, ctx.dice, command.item, command.target);
    }
  }

  private rest(ctx: RulesContext, count: number): ActionOutcome {
    const messages: string[] = [];
    let result = applyRest(ctx.registry, ctx.state);
    messages.push(result.message);
    for (let i = 1; i < count; i++) {
      result = applyRest(ctx.registry, ctx.state);
      messages.push(result.message);
    }
    return {
      consumed: true,
      message: messages.join(' '),
      decision: result.decision ?? undefined,
      turns: count,
    };
  }
}
