// Application layer: Game session coordinator
// Owns one GameState and runs parse -> rules -> bookkeeping -> save -> narrate

import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameState, PendingDecision } from '@/domain/game/GameState.js';
import { NARRATION_LOG_WINDOW } from '@/domain/game/GameState.js';
import type { ActionOutcome, RulesContext, SessionMode } from '@/domain/game/session.js';
import type { DiceEngine } from '@/domain/game/types.js';
import type { INarrator, NarrationResult } from '@/domain/llm/narration.js';
import { CombatState } from '@/application/game/states/CombatState.js';
import { ExplorationState, MAX_REST_COUNT } from '@/application/game/states/ExplorationState.js';
import { activeCompanion } from '@/application/game/rules/party.js';
import { resetRestStreak, resolveDecision } from '@/application/game/rules/rest.js';
import { applyCampaignCompletion } from '@/application/game/setup.js';
import { buildNarrationSnapshot } from '@/application/game/snapshot.js';

export const GAME_OVER_MESSAGE = 'The adventure is over.';

/**
 * Where a session writes itself after every resolved action
 */
export interface SessionStore {
  save(gameId: string, state: GameState): Promise<void>;
}

export interface GameSessionDependencies {
  registry: ContentLookup;
  dice: DiceEngine;
  narrator: INarrator;
  store: SessionStore;
  maxRestCount?: number;
}

export interface ActionResult {
  consumed: boolean;
  rulesResult: string;
  narration: NarrationResult | null;
  decision: PendingDecision | null;
  turn: number;
  mode: SessionMode;
  gameOver: boolean;
}

interface Dispatched {
  outcome: ActionOutcome;
  resting: boolean;
}

/**
 * GameSession - single control loop for one adventure.
 * Rules resolution is synchronous; only saving and narration wait on I/O.
 * One call runs at a time per session.
 */
export class GameSession {
  private readonly exploration: ExplorationState;
  private readonly combat = new CombatState();
  private queue: Promise<void> = Promise.resolve();

  constructor(
    readonly id: string,
    private readonly state: GameState,
    private readonly deps: GameSessionDependencies
  ) {
    this.exploration = new ExplorationState(deps.maxRestCount ?? MAX_REST_COUNT);
  }

  getState(): GameState {
    return this.state;
  }

  get mode(): SessionMode {
    return this.state.inCombat ? this.combat.name : this.exploration.name;
  }

  /**
   * Calls on one session queue up and resolve in the order they arrived
   */
  processAction(input: string): Promise<ActionResult> {
    return this.serialize(() => this.runAction(input));
  }

  /**
   * Answers the waiting level-up choice; takes no turn
   */
  resolveDecision(choice: string): Promise<ActionResult> {
    return this.serialize(async () => {
      const outcome = resolveDecision(this.state, choice);
      if (outcome.consumed) {
        this.state.lastEvent = outcome.message;
        await this.persist();
      }
      return this.result(outcome.consumed, outcome.message, outcome.decision ?? null);
    });
  }

  suggest(): Promise<NarrationResult> {
    return this.serialize(() => {
      const companion = activeCompanion(this.state);
      const actions = this.state.inCombat ? this.combat.actions : this.exploration.actions;
      return this.deps.narrator.suggest({
        snapshot: buildNarrationSnapshot(this.deps.registry, this.state),
        actions: [...actions],
        companionName: companion?.name ?? 'Your companion',
      });
    });
  }

  save(): Promise<void> {
    return this.serialize(() => this.persist());
  }

  private async runAction(input: string): Promise<ActionResult> {
    const { state } = this;
    if (state.gameOver) {
      return this.result(false, GAME_OVER_MESSAGE);
    }

    const dispatched = this.dispatch(input);
    if (!dispatched) {
      return this.result(false, this.usage());
    }
    const { outcome, resting } = dispatched;
    if (!outcome.consumed) {
      return this.result(false, outcome.message, outcome.decision ?? null);
    }

    let message = outcome.message;
    const completion = applyCampaignCompletion(this.deps.registry, state);
    if (completion && completion.length > 0) {
      message = [message, ...completion].join(' ');
    }

    state.turn += outcome.turns ?? 1;
    state.lastEvent = message;
    state.lastPlayerInput = input;
    state.turnLog.push(`Turn ${state.turn}: input=${JSON.stringify(input)} | ${message}`);
    if (state.turnLog.length > NARRATION_LOG_WINDOW) {
      state.turnLog.splice(0, state.turnLog.length - NARRATION_LOG_WINDOW);
    }
    if (!resting) {
      resetRestStreak(state);
    }

    const resolved = this.result(true, message, outcome.decision ?? null);
    const snapshot = buildNarrationSnapshot(this.deps.registry, state);

    await this.persist();

    const narration = await this.deps.narrator.narrate({ snapshot, playerInput: input, rulesResult: message });
    state.narrationLog.push({
      turn: resolved.turn,
      playerInput: input,
      rulesResult: message,
      narration: narration.text,
      source: narration.source,
    });
    if (state.narrationLog.length > NARRATION_LOG_WINDOW) {
      state.narrationLog.splice(0, state.narrationLog.length - NARRATION_LOG_WINDOW);
    }

    return { ...resolved, narration };
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    // A failed call rejects for its own caller only; later calls still run
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async persist(): Promise<void> {
    await this.deps.store.save(this.id, this.state);
  }

  private context(): RulesContext {
    return { registry: this.deps.registry, dice: this.deps.dice, state: this.state };
  }

  private usage(): string {
    return this.state.inCombat ? this.combat.usage : this.exploration.usage;
  }

  private dispatch(input: string): Dispatched | null {
    const ctx = this.context();
    if (this.state.inCombat) {
      const command = this.combat.parse(input);
      return command ? { outcome: this.combat.handle(command, ctx), resting: false } : null;
    }
    const command = this.exploration.parse(input);
    if (!command) return null;
    return { outcome: this.exploration.handle(command, ctx), resting: command.type === 'rest' };
  }

  private result(consumed: boolean, message: string, decision: PendingDecision | null = null): ActionResult {
    return {
      consumed,
      rulesResult: message,
      narration: null,
      decision,
      turn: this.state.turn,
      mode: this.mode,
      gameOver: this.state.gameOver,
    };
  }
}
