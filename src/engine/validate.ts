import { issue } from '../schema';
import type { MatchState, ValidationIssue } from '../types';

/**
 * 对局不变量检查。每个被接受的意图之后运行；有 error 说明是程序缺陷。
 */
export function validate_match(match: MatchState): { errors: ValidationIssue[]; warnings: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const { roster } = match;
  const modules = match.modules;

  for (const p of roster.players) {
    // —— BALANCE：余额永不为负
    if (p.balance < 0) {
      errors.push(issue('INVARIANT_BALANCE_NEGATIVE', `/players/${p.id}/balance`, `player ${p.id} balance ${p.balance} < 0`));
    }

    if (!modules) continue;

    // —— POSITION：位置在棋盘内
    if (!modules.board.is_valid_position(p.position)) {
      errors.push(issue('INVARIANT_POSITION_RANGE', `/players/${p.id}/position`, `player ${p.id} position ${p.position} is off the board`));
    }

    // —— HEALTH：0 ≤ health ≤ max，血量归零必须已出局
    if (modules.combat) {
      const r = modules.combat.record(p.id);
      if (r.health < 0 || r.health > r.max_health) {
        errors.push(issue('INVARIANT_HEALTH_RANGE', `/players/${p.id}/health`, `player ${p.id} health ${r.health} outside 0..${r.max_health}`));
      }
      if (!r.alive && p.active) {
        errors.push(issue('INVARIANT_DEAD_ACTIVE', `/players/${p.id}/active`, `player ${p.id} has no health but is still active`));
      }
    }
  }

  // —— OWNERSHIP：owner 必须是存活玩家，且与 owned_positions 双向一致
  if (modules?.property) {
    for (const r of modules.property.all()) {
      if (r.owner === null) continue;
      if (!roster.is_active(r.owner)) {
        errors.push(issue('INVARIANT_OWNER_INACTIVE', `/properties/${r.position}/owner`, `property ${r.position} is owned by inactive player ${r.owner}`));
      }
    }
    for (const p of roster.players) {
      const expected = modules.property.records_of(p.id).map((r) => r.position);
      const same = expected.length === p.owned_positions.length && expected.every((pos, i) => p.owned_positions[i] === pos);
      if (!same) {
        errors.push(issue('INVARIANT_OWNED_SYNC', `/players/${p.id}/owned_positions`, `player ${p.id} owned_positions ${JSON.stringify(p.owned_positions)} != ${JSON.stringify(expected)}`));
      }
    }
  } else {
    for (const p of roster.players) {
      if (p.owned_positions.length > 0 && modules) {
        errors.push(issue('INVARIANT_OWNED_SYNC', `/players/${p.id}/owned_positions`, `player ${p.id} owns positions without a property module`));
      }
    }
  }

  // —— TURN：等待意图时当前玩家必须存活
  if (match.phase === 'awaiting_intent' && !roster.is_active(match.current_player)) {
    errors.push(issue('INVARIANT_CURRENT_INACTIVE', '/current_player', `current player ${match.current_player} is not active`));
  }

  if (match.phase === 'match_over' && match.winner !== null && !roster.is_active(match.winner)) {
    warnings.push(issue('WINNER_INACTIVE', '/winner', `winner ${match.winner} is not active`));
  }

  return { errors, warnings };
}
