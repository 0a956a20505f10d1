// Domain layer: Game session types and interfaces
// NO external dependencies - pure TypeScript

import type { GameState, PendingDecision } from './GameState.js';
import type { DiceEngine } from './types.js';
import type { ContentLookup } from '../content/registry.js';

export type SessionMode = 'exploration' | 'combat';

export type TalkVerb = 'talk' | 'speak' | 'parley' | 'approach';
export type SearchVerb = 'search' | 'open' | 'inspect' | 'look';
export type LeaveVerb = 'leave' | 'continue';

/**
 * Verbs a room handler understands; movement without a destination
 * is handed to the room as 'move'/'go'.
 */
export type RoomVerb = TalkVerb | SearchVerb | LeaveVerb | 'loot' | 'move' | 'go';

export interface UseCommand {
  type: 'use';
  item: string;
  target: string | null;
}

export type ExplorationCommand =
  | { type: 'room'; verb: RoomVerb; target: string }
  | { type: 'move'; destination: string | null }
  | { type: 'rest'; count: number }
  | { type: 'equip'; query: string }
  | { type: 'unequip'; slot: string }
  | UseCommand;

export type CombatCommand =
  | { type: 'attack'; target: string | null }
  | { type: 'defend' }
  | { type: 'special'; target: string | null }
  | { type: 'cast'; text: string }
  | UseCommand;

/**
 * Everything a rules function needs: content, dice and the state it mutates
 */
export interface RulesContext {
  registry: ContentLookup;
  dice: DiceEngine;
  state: GameState;
}

/**
 * Result of one player action
 * consumed=false means nothing changed and no turn passed
 */
export interface ActionOutcome {
  consumed: boolean;
  message: string;
  /** Set by rest when a level-up choice is waiting */
  decision?: PendingDecision;
  /** Rest only: number of turns this action used */
  turns?: number;
}

/**
 * Game state machine interface
 * Each mode owns its own command vocabulary
 */
export interface IGameState<TCommand> {
  readonly name: SessionMode;

  parse(input: string): TCommand | null;

  /** Short usage line shown for unrecognized input */
  readonly usage: string;

  /** Verbs offered to the companion when it suggests a move */
  readonly actions: readonly string[];

  /** Resolve one command synchronously; never waits on I/O */
  handle(command: TCommand, ctx: RulesContext): ActionOutcome;
}
