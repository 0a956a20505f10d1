// Application layer: Combat state implementation
// One command is the player's part of a round; the rest of the round follows it

import type { ActionOutcome, CombatCommand, IGameState, RulesContext } from '@/domain/game/session.js';
import { parseUse, tokenize } from '@/application/game/commands/parse.js';
import {
  finishRound,
  playerAttack,
  playerCast,
  playerDefend,
  playerSpecial,
} from '@/application/game/rules/combat.js';
import { useItem } from '@/application/game/rules/inventory.js';

export class CombatState implements IGameState<CombatCommand> {
  readonly name = 'combat' as const;
  readonly usage = 'Choose attack [target], defend, special [target], cast <spell> [target], or use <item> [on <target>].';

  readonly actions = ['attack', 'defend', 'special', 'cast <spell> [target]', 'use'] as const;

  parse(input: string): CombatCommand | null {
    const tokens = tokenize(input);
    const { verb, rest } = tokens;

    const use = parseUse(tokens);
    if (use) return use;

    switch (verb) {
      case 'attack':
        return { type: 'attack', target: rest || null };
      case 'defend':
        return rest ? null : { type: 'defend' };
      case 'special':
        return { type: 'special', target: rest || null };
      case 'cast':
        return { type: 'cast', text: rest };
      default:
        return null;
    }
  }

  handle(command: CombatCommand, ctx: RulesContext): ActionOutcome {
    const outcome = this.playerAction(command, ctx);
    if (!outcome.consumed) {
      return outcome;
    }
    return { consumed: true, message: finishRound(ctx, outcome.message) };
  }

  private playerAction(command: CombatCommand, ctx: RulesContext): ActionOutcome {
    switch (command.type) {
      case 'attack':
        return playerAttack(ctx, command.target);
      case 'defend':
        return playerDefend(ctx.state);
      case 'special':
        return playerSpecial(ctx, command.target);
      case 'cast':
        return playerCast(ctx, command.text);
      case 'use':
        return useItem(ctx.state, ctx.dice, command.item, command.target);
    }
  }
}
