import type { MatchSnapshot, MatchState } from '../types';
import { canonical_hash } from '../utils/canonical.util';

/** 只读快照：全部是拷贝，不泄露任何内部引用 */
export function snapshot_match(match: MatchState): MatchSnapshot {
  const m = match.modules;
  return {
    archetype: match.archetype,
    rules_id: match.rules_id,
    phase: match.phase,
    turn: match.turn,
    current_player: match.current_player,
    last_seq: match.last_seq,
    winner: match.winner,
    topology: { ...match.topology },
    modules: {
      board: m !== null,
      movement: m !== null,
      currency: m?.currency != null,
      property: m?.property != null,
      combat: m?.combat != null,
    },
    players: match.roster.players.map((p) => ({ ...p, owned_positions: [...p.owned_positions] })),
    properties: m?.property ? m.property.all().map((r) => ({ ...r })) : [],
    trade_offer: m?.property ? m.property.pending_offer() : null,
    combat: m?.combat ? m.combat.records() : [],
  };
}

/** 快照哈希（sha256:...）：同一状态永远得到同一哈希 */
export function state_hash(match: MatchState): string {
  return canonical_hash(snapshot_match(match));
}
