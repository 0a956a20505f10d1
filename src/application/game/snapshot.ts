// Application layer: Read-only narration snapshot of a game

import type { ContentLookup } from '@/domain/content/registry.js';
import type { GameState } from '@/domain/game/GameState.js';
import type { Combatant } from '@/domain/game/types.js';
import type { CombatantSnapshot, NarrationSnapshot } from '@/domain/llm/narration.js';

const RECENT_TURNS = 5;

function unitSnapshot(unit: Combatant & { mana?: number; maxMana?: number }): CombatantSnapshot {
  const snapshot: CombatantSnapshot = { name: unit.name, hp: unit.hp, maxHp: unit.maxHp, ac: unit.ac };
  if (unit.maxMana) {
    snapshot.mana = unit.mana;
    snapshot.maxMana = unit.maxMana;
  }
  return snapshot;
}

export function buildNarrationSnapshot(registry: ContentLookup, state: GameState): NarrationSnapshot {
  const campaign = registry.getCampaign(state.campaignId);
  const room = registry.getRoom(state.campaignId, state.roomId);
  const { player } = state;

  return {
    campaignName: campaign.name,
    room: { id: room.id, name: room.name, kind: room.kind, description: room.description },
    player: {
      ...unitSnapshot(player),
      mana: player.mana,
      maxMana: player.maxMana,
      race: player.race,
      className: player.className,
      level: player.level,
      gold: player.gold,
    },
    companions: state.companions.map(unitSnapshot),
    enemies: state.enemies.filter((enemy) => enemy.hp > 0).map(unitSnapshot),
    inCombat: state.inCombat,
    gameOver: state.gameOver,
    inventory: state.inventory.map((item) => item.name),
    questFlags: Object.entries(state.flags.quest)
      .filter(([, value]) => value)
      .map(([key]) => key),
    recentTurns: state.turnLog.slice(-RECENT_TURNS),
  };
}
