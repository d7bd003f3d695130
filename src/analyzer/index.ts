import { issue, parse_rules } from '../schema';
import type { RulesType } from '../schema';
import type { AnalysisOutput, AnalyzeDocumentOutput, Archetype, ValidationIssue } from '../types';
import { canonical_hash } from '../utils/canonical.util';
import { board_topology } from '../engine/modules/board';
import { check_conflicts, check_warnings } from './conflicts';

export { check_conflicts, check_warnings } from './conflicts';

/**
 * 按固定优先级判定对局形态（调用方保证已无冲突）：
 *   分开的棋盘 + 布船 → grid_combat
 *   货币 + 可购地产 + 共享棋盘 → trading
 *   只剩移动/骰子 → race
 *   其余 → hybrid
 */
export function classify_archetype(rules: RulesType): Archetype {
  if (rules.separate_boards && rules.ship_placement) return 'grid_combat';
  if (rules.currency_enabled && rules.property_purchasable && !rules.separate_boards) return 'trading';
  const movement_only =
    !rules.currency_enabled &&
    !rules.property_purchasable &&
    !rules.combat_enabled &&
    !rules.resources_enabled &&
    !rules.separate_boards;
  if (movement_only) return 'race';
  return 'hybrid';
}

function clamp(n: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, n));
}

function archetype_players(rules: RulesType, archetype: Archetype): number {
  switch (archetype) {
    case 'trading':
    case 'race':
      return clamp(rules.max_players, 2, 4);
    case 'grid_combat':
      return 2;
    case 'hybrid':
      return rules.max_players;
  }
}

/** 未指定人数时的默认人数（夹在 [min_players, max_players] 内） */
export function recommended_players(rules: RulesType, archetype: Archetype): number {
  return clamp(archetype_players(rules, archetype), rules.min_players, rules.max_players);
}

/**
 * analyze_rules()
 * ---------------
 * 纯函数：同一份规则永远得到同一结果。
 * 先做一致性检查（fail closed）：只要有冲突就是 hybrid + valid=false，不会“猜”一个形态。
 */
export function analyze_rules(rules: RulesType): AnalysisOutput {
  const conflicts = check_conflicts(rules);
  const warnings = check_warnings(rules);
  const valid = conflicts.length === 0;
  const archetype: Archetype = valid ? classify_archetype(rules) : 'hybrid';
  return {
    archetype,
    valid,
    conflicts,
    warnings,
    rules_id: canonical_hash(rules),
    recommended_players: recommended_players(rules, archetype),
  };
}

/**
 * 先用 zod 解析原始文档，再分析。
 * schema 错误包装成 SCHEMA_ERROR；分析冲突原样放进 errors。
 */
export function analyze_document(doc: unknown): AnalyzeDocumentOutput {
  const result = parse_rules(doc);
  if (!result.success) {
    const errors: ValidationIssue[] = result.error.issues.map((e) =>
      issue('SCHEMA_ERROR', '/' + e.path.join('/'), e.message),
    );
    return { ok: false, rules: null, analysis: null, errors };
  }
  const rules = result.data;
  const analysis = analyze_rules(rules);
  if (!analysis.valid) return { ok: false, rules, analysis, errors: analysis.conflicts };
  return { ok: true, rules, analysis, errors: [] };
}

const on_off = (b: boolean) => (b ? 'on' : 'off');

/** 人类可读的规则摘要（CLI 输出与调试用） */
export function describe_rules(rules: RulesType): string[] {
  const analysis = analyze_rules(rules);
  const topo = board_topology(rules);
  const lines: string[] = [];

  lines.push(`archetype: ${analysis.archetype}${analysis.valid ? '' : ' (invalid)'}`);
  lines.push(
    topo.shape === 'square_grid'
      ? `board: ${topo.tiles_per_side}x${topo.tiles_per_side} grid per player`
      : `board: ${topo.size}-space loop`,
  );
  lines.push(
    rules.currency_enabled
      ? `currency: start ${rules.starting_balance}, pass bonus ${rules.pass_bonus}`
      : 'currency: off',
  );
  if (rules.property_purchasable) {
    lines.push(
      `property: trade ${on_off(rules.property_tradable)}, rent ${on_off(rules.rent_collectible)}, bankruptcy ${on_off(rules.bankruptcy_enabled)}`,
    );
  } else {
    lines.push('property: off');
  }
  lines.push(
    rules.combat_enabled
      ? `combat: every ${rules.combat_interval} spaces, health ${rules.starting_health}`
      : 'combat: off',
  );
  lines.push(`players: ${rules.min_players}-${rules.max_players}`);
  lines.push(
    rules.win_condition === 'balance_threshold'
      ? `win: balance_threshold ${rules.win_balance_threshold}`
      : `win: ${rules.win_condition}`,
  );
  const extra = rules.duplicates_grant_extra_turn ? `, extra turn on ${rules.duplicates_required} matching` : '';
  lines.push(`dice: ${rules.dice_count}d${rules.dice_sides}${extra}`);
  if (rules.resources_enabled) {
    const cap = rules.resource_cap === null ? 'uncapped' : `cap ${rules.resource_cap}`;
    lines.push(`resources: ${rules.resource_names.join(', ')} (${cap})`);
  }
  for (const c of analysis.conflicts) lines.push(`conflict: ${c.code}`);
  for (const w of analysis.warnings) lines.push(`warning: ${w.code}`);
  return lines;
}
