// Application layer: Narrator agent
// Turns resolved rules results into flavour text; never touches game state

import type { ILLMClient, LLMMessage } from '@/domain/llm/types.js';
import type {
  INarrator,
  NarrationRequest,
  NarrationResult,
  SuggestionRequest,
} from '@/domain/llm/narration.js';
import {
  buildSystemBlock,
  everyoneAtFullHp,
  fillPrompt,
  formatSnapshotForCompanion,
  formatSnapshotForNarrator,
  loadPrompt,
} from '@/utils/prompts.js';

const FALLBACK_NARRATION = [
  'The ruin creaks with old stone. What do you do?',
  "You take a breath as the air shifts. What's your move?",
  'Shadows stretch across the stones, silent and watchful. What do you do next?',
];

const FALLBACK_SUGGESTIONS = [
  "{companion} whispers, 'Keep your distance and watch for traps.'",
  "{companion} says, 'Let me cover you while you act.'",
  "{companion} mutters, 'Slow and steady, no sudden moves.'",
];

const FULL_HP_NOTE = 'Everyone at full HP. Suggest movement, exploration, or combat, not healing.';

export interface NarratorOptions {
  /** Total attempts per request, at least 1 */
  maxRetries?: number;
  retryBaseDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class Narrator implements INarrator {
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private fallbackCursor = 0;

  constructor(
    private readonly client: ILLMClient | null,
    options: NarratorOptions = {}
  ) {
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async narrate(request: NarrationRequest): Promise<NarrationResult> {
    const messages: LLMMessage[] = [
      { role: 'system', content: loadPrompt('narrator') },
      {
        role: 'user',
        content: [
          buildSystemBlock('STATE', formatSnapshotForNarrator(request.snapshot)),
          buildSystemBlock('PLAYER_INPUT', request.playerInput),
          buildSystemBlock('RULES_RESULT', request.rulesResult),
          "Add brief atmospheric flavor (do not repeat RULES_RESULT verbatim) and end with a short question prompting the player's next action.",
        ]
          .filter(Boolean)
          .join('\n\n'),
      },
    ];
    return this.complete(messages, () => this.nextFallback(FALLBACK_NARRATION));
  }

  async suggest(request: SuggestionRequest): Promise<NarrationResult> {
    const companion = request.companionName;
    const note = everyoneAtFullHp(request.snapshot) ? FULL_HP_NOTE : '';
    const messages: LLMMessage[] = [
      { role: 'system', content: fillPrompt(loadPrompt('companion'), { companion }) },
      {
        role: 'user',
        content: [
          buildSystemBlock('STATE', formatSnapshotForCompanion(request.snapshot)),
          note,
          `Available actions: ${request.actions.join(', ')}`,
          'Give a brief suggestion.',
        ]
          .filter(Boolean)
          .join('\n\n'),
      },
    ];
    return this.complete(messages, () =>
      fillPrompt(this.nextFallback(FALLBACK_SUGGESTIONS), { companion })
    );
  }

  private async complete(messages: LLMMessage[], fallback: () => string): Promise<NarrationResult> {
    if (!this.client) {
      return { text: fallback(), source: 'stub' };
    }

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      try {
        const response = await this.client.chat(messages);
        if (response.content) {
          return { text: response.content, source: 'ai' };
        }
        console.warn(`[Narrator] Empty response on attempt ${attempt + 1}`);
      } catch (error) {
        console.warn(
          `[Narrator] Attempt ${attempt + 1}/${this.maxRetries} failed:`,
          error instanceof Error ? error.message : error
        );
      }
      if (attempt < this.maxRetries - 1) {
        await this.sleep(this.retryBaseDelayMs * 2 ** attempt);
      }
    }

    console.error(`[Narrator] Giving up after ${this.maxRetries} attempts, using fallback`);
    return { text: fallback(), source: 'fallback' };
  }

  private nextFallback(lines: string[]): string {
    const line = lines[this.fallbackCursor % lines.length];
    this.fallbackCursor += 1;
    return line;
  }
}
