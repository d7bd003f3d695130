import type { MatchState } from '../types';

/**
 * 轮到下一个存活玩家（按 id 循环，跳过已出局者）。
 * 从较大 id 绕回较小 id 视为整轮结束，turn 自增。
 */
export function end_turn(match: MatchState): void {
  const current = match.current_player;
  const next = match.roster.next_active_after(current);
  if (next === null) return;
  if (next <= current) match.turn += 1;
  match.current_player = next;
  match.outbox.push({ type: 'turn_advanced', player_id: next, turn: match.turn });
}
