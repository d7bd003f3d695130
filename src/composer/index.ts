import { analyze_rules } from '../analyzer';
import { issue, parse_rules } from '../schema';
import type { RulesType } from '../schema';
import type { ComposeInput, ComposeOutput, MatchEventBody, MatchState, PropertyRecord, ValidationIssue } from '../types';
import { BoardModel } from '../engine/modules/board';
import { CombatModel } from '../engine/modules/combat';
import { CurrencyLedger } from '../engine/modules/currency';
import { MovementModel } from '../engine/modules/movement';
import { PropertyRegistry } from '../engine/modules/property';
import { Roster } from '../engine/modules/roster';
import { mix_seed, mulberry32 } from '../utils/rng.util';
import { layout_properties, place_properties } from './properties';

export { layout_properties, place_properties } from './properties';

/** 各模块独立的随机流 */
const PLACEMENT_SALT = 1;
const COMBAT_SALT = 2;

function dependency(message: string, fields: string[]): ValidationIssue {
  return issue('MODULE_DEPENDENCY', '/', message, { fields });
}

function player_count(rules: RulesType, requested: number | undefined, recommended: number): number | ValidationIssue {
  if (requested === undefined) return recommended;
  if (!Number.isInteger(requested) || requested < 1) {
    return issue('INVALID_PLAYER_COUNT', '/players', `player count must be a positive integer, got ${requested}`);
  }
  return Math.min(rules.max_players, Math.max(rules.min_players, requested));
}

/**
 * compose_match()
 * ---------------
 * 规则 → 分析 → 按 Board → Currency → Property → Combat → Movement 的顺序组装模块。
 * 任何一步失败都返回 { ok:false, match:null }，不会把装了一半的对局交给调用方。
 * 模块是否存在只看各自的开关：
 *   currency ⇔ currency_enabled，property ⇔ property_purchasable，combat ⇔ combat_enabled
 */
export function compose_match(input: ComposeInput): ComposeOutput {
  const parsed = parse_rules(input.rules);
  if (!parsed.success) {
    const errors = parsed.error.issues.map((e) => issue('SCHEMA_ERROR', '/rules/' + e.path.join('/'), e.message));
    return { ok: false, match: null, analysis: null, errors, warnings: [] };
  }
  const rules = parsed.data;
  const analysis = analyze_rules(rules);
  const warnings = analysis.warnings;
  const fail = (errors: ValidationIssue[]): ComposeOutput => ({ ok: false, match: null, analysis, errors, warnings });

  if (!analysis.valid) return fail(analysis.conflicts);

  const count = player_count(rules, input.players, analysis.recommended_players);
  if (typeof count !== 'number') return fail([count]);

  // —— 依赖检查（按构造顺序报第一个无法满足的依赖）
  if (rules.property_purchasable && !rules.currency_enabled) {
    return fail([dependency('Property module requires Currency module', ['property_purchasable', 'currency_enabled'])]);
  }
  const board = new BoardModel(rules);
  if (board.size === 0) {
    return fail([dependency('Movement module requires Board module with at least one space', ['tiles_per_side'])]);
  }

  const seed = (input.seed ?? 0) >>> 0;

  let records: PropertyRecord[] = [];
  if (rules.property_purchasable) {
    if (input.properties) {
      const laid = layout_properties(rules, board.size, input.properties);
      if (laid.errors.length) return fail(laid.errors);
      records = laid.records;
    } else {
      records = place_properties(rules, board.size, mulberry32(mix_seed(seed, PLACEMENT_SALT)));
    }
  }

  const roster = Roster.seed(count, rules.currency_enabled ? rules.starting_balance : 0, rules.starting_health);
  const outbox: MatchEventBody[] = [];
  const match: MatchState = {
    rules,
    rules_id: analysis.rules_id,
    archetype: analysis.archetype,
    seed,
    topology: board.topology,
    roster,
    modules: null,
    phase: 'awaiting_intent',
    current_player: 0,
    turn: 1,
    last_seq: 0,
    winner: null,
    outbox,
  };
  const emit = (event: MatchEventBody) => {
    match.outbox.push(event);
  };

  const currency = rules.currency_enabled
    ? new CurrencyLedger(roster, emit, {
        checkpoint_interval: rules.checkpoint_interval,
        checkpoint_bonus: rules.checkpoint_bonus,
      })
    : null;

  const property =
    rules.property_purchasable && currency
      ? new PropertyRegistry(
          roster,
          currency,
          emit,
          {
            purchasable: rules.property_purchasable,
            tradable: rules.property_tradable,
            rent_collectible: rules.rent_collectible,
            bankruptcy_enabled: rules.bankruptcy_enabled,
          },
          records,
        )
      : null;

  const combat = rules.combat_enabled
    ? new CombatModel(
        roster,
        mulberry32(mix_seed(seed, COMBAT_SALT)),
        emit,
        property
          ? (id) => {
              property.release_all(id);
            }
          : null,
        {
          max_health: rules.starting_health,
          combat_interval: rules.combat_interval,
          separate_boards: rules.separate_boards,
          environment_damage: rules.environment_damage,
          landing_damage: rules.landing_damage,
          attack_damage: rules.attack_damage,
        },
      )
    : null;

  const movement = new MovementModel(board, roster, emit, currency, rules.pass_bonus);

  match.modules = { board, movement, currency, property, combat };
  return { ok: true, match, analysis, errors: [], warnings };
}
