// Utilities: Prompt management
// Pure functions for loading and building prompts

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { fileURLToPath } from 'url';
import type { CombatantSnapshot, NarrationSnapshot } from '@/domain/llm/narration.js';

// Default prompt directory, beside the campaign content
const DEFAULT_PROMPT_DIR = fileURLToPath(new URL('../../content/prompts', import.meta.url));

// Cache for loaded prompts
const promptCache = new Map<string, string>();

/**
 * Get the prompt directory path
 */
export function getPromptDir(): string {
  return resolve(process.env.PROMPT_DIR || DEFAULT_PROMPT_DIR);
}

/**
 * Load a prompt by name
 * Tries .md first, then .txt
 */
export function loadPrompt(name: string, useCache = true): string {
  const cached = useCache ? promptCache.get(name) : undefined;
  if (cached !== undefined) {
    return cached;
  }

  const dir = getPromptDir();
  const extensions = ['.md', '.txt'];

  for (const ext of extensions) {
    const path = resolve(dir, `${name}${ext}`);
    if (existsSync(path)) {
      const content = readFileSync(path, 'utf-8').trim();
      if (useCache) promptCache.set(name, content);
      return content;
    }
  }

  throw new Error(
    `Prompt not found: "${name}". Tried: ${extensions.map((e) => `${name}${e}`).join(', ')} in ${dir}`
  );
}

/**
 * Replace {key} placeholders
 */
export function fillPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => values[key] ?? match);
}

// ========== Prompt Building Utilities ==========

/**
 * Build a tagged block for prompts
 */
export function buildSystemBlock(title: string, body: string): string {
  const trimmed = body.trim();
  if (!trimmed) return '';
  return `[${title}]\n${trimmed}\n[/${title}]`;
}

function formatUnit(unit: CombatantSnapshot): string {
  const mana = unit.maxMana ? ` Mana ${unit.mana ?? 0}/${unit.maxMana}` : '';
  return `${unit.name} HP ${unit.hp}/${unit.maxHp}${mana}`;
}

/**
 * State summary for the narrator
 */
export function formatSnapshotForNarrator(snapshot: NarrationSnapshot): string {
  const { player } = snapshot;
  const lines = [
    `Campaign: ${snapshot.campaignName}`,
    `Room: ${snapshot.room.name}`,
    `Room kind: ${snapshot.room.kind}`,
    `Player: ${player.name} (${player.race} ${player.className}) Level ${player.level} HP ${player.hp}/${player.maxHp} AC ${player.ac}`,
    `Mana: ${player.mana ?? 0}/${player.maxMana ?? 0}`,
    `Gold: ${player.gold}`,
    `Companions: ${snapshot.companions.map(formatUnit).join(' | ') || '(none)'}`,
    `Inventory: ${snapshot.inventory.join(', ') || '(empty)'}`,
    `In combat: ${snapshot.inCombat}`,
  ];
  if (snapshot.enemies.length > 0) {
    lines.push(`Enemies: ${snapshot.enemies.map(formatUnit).join(' | ')}`);
  }
  if (snapshot.questFlags.length > 0) {
    lines.push(`Flags: ${snapshot.questFlags.join(', ')}`);
  }
  if (snapshot.gameOver) {
    lines.push('The adventure has ended.');
  }
  return lines.join('\n');
}

/**
 * Shorter summary for companion suggestions
 */
export function formatSnapshotForCompanion(snapshot: NarrationSnapshot): string {
  const { player } = snapshot;
  const lines = [
    `Room: ${snapshot.room.name} (${snapshot.room.kind})`,
    `Player Level ${player.level} HP ${player.hp}/${player.maxHp}`,
    ...snapshot.companions.map(formatUnit),
    `Mana: ${player.mana ?? 0}/${player.maxMana ?? 0}`,
    `Gold: ${player.gold}`,
    `Inventory: ${snapshot.inventory.join(', ') || '(empty)'}`,
    `In combat: ${snapshot.inCombat}`,
  ];
  if (snapshot.enemies.length > 0) {
    lines.push(`Enemies: ${snapshot.enemies.map(formatUnit).join(' | ')}`);
  }
  const lastTurn = snapshot.recentTurns[snapshot.recentTurns.length - 1];
  if (lastTurn) {
    lines.push(`Last event: ${lastTurn}`);
  }
  return lines.join('\n');
}

export function everyoneAtFullHp(snapshot: NarrationSnapshot): boolean {
  return [snapshot.player, ...snapshot.companions].every((unit) => unit.hp >= unit.maxHp);
}
