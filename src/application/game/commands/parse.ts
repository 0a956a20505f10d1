// Application layer: Shared command parsing helpers

import type { UseCommand } from '@/domain/game/session.js';
import { normalizeInput } from '@/utils/string.js';

export interface Tokens {
  verb: string;
  rest: string;
}

/**
 * Lower-cases, collapses whitespace and splits off the first word
 */
export function tokenize(input: string): Tokens {
  const normalized = normalizeInput(input).toLowerCase();
  const space = normalized.indexOf(' ');
  if (space < 0) {
    return { verb: normalized, rest: '' };
  }
  return { verb: normalized.slice(0, space), rest: normalized.slice(space + 1) };
}

/**
 * "use|drink <item> [on <target>]"
 */
export function parseUse({ verb, rest }: Tokens): UseCommand | null {
  if (verb !== 'use' && verb !== 'drink') return null;
  const on = rest.lastIndexOf(' on ');
  if (on < 0) {
    return { type: 'use', item: rest, target: null };
  }
  return { type: 'use', item: rest.slice(0, on), target: rest.slice(on + 4) || null };
}
