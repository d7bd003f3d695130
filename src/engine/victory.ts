import type { MatchState, VictoryReason } from '../types';
import type { MoveResult } from './modules/movement';

export interface VictoryResult {
  winner_id: number | null;
  reason: VictoryReason;
}

/**
 * 胜负判定（每个被接受的意图之后调用一次）：
 * 1. 开局至少两人时，任何胜利条件下存活玩家 ≤ 1 都直接结束（0 人存活 → 无胜者）；
 *    单人局只在唯一玩家出局时结束，否则按自己的胜利条件判定
 * 2. balance_threshold：先看行动者，再按 id 从小到大找第一个余额达标的存活玩家
 * 3. reach_goal：行动者走到终点（position ≥ 最后一格），环形棋盘上越过起点也算走完全程
 * 4. elimination：只有第 1 条
 */
export function eval_victory(
  match: MatchState,
  mover_id: number,
  move: MoveResult | null = null,
): VictoryResult | null {
  const { roster, rules } = match;
  const active = roster.active_players();
  const last_standing = roster.size >= 2 ? active.length <= 1 : active.length === 0;
  if (last_standing) {
    return { winner_id: active[0]?.id ?? null, reason: 'last_player_standing' };
  }

  const modules = match.modules;
  if (!modules) return null;

  switch (rules.win_condition) {
    case 'elimination':
      return null;
    case 'balance_threshold': {
      if (!modules.currency) return null;
      const order = [mover_id, ...active.map((p) => p.id).filter((id) => id !== mover_id)];
      const winner = order.find(
        (id) => roster.is_active(id) && roster.get(id).balance >= rules.win_balance_threshold,
      );
      return winner === undefined ? null : { winner_id: winner, reason: 'balance_threshold' };
    }
    case 'reach_goal': {
      if (!roster.is_active(mover_id)) return null;
      const reached =
        roster.get(mover_id).position >= modules.board.goal_position() || (move?.passed_start ?? false);
      return reached ? { winner_id: mover_id, reason: 'reach_goal' } : null;
    }
  }
}
