import { issue } from '../schema';
import type { RulesType } from '../schema';
import type { ValidationIssue } from '../types';

/**
 * 字段之间的一致性检查（致命）。
 * 每条冲突都带上相互矛盾的字段名，方便编辑器直接定位。
 */
export function check_conflicts(rules: RulesType): ValidationIssue[] {
  const out: ValidationIssue[] = [];

  if (rules.property_tradable && !rules.property_purchasable) {
    out.push(
      issue('TRADE_REQUIRES_PURCHASE', '/property_tradable', 'trading needs purchasable properties', {
        hint: 'enable property_purchasable or disable property_tradable',
        fields: ['property_tradable', 'property_purchasable'],
      }),
    );
  }

  if (rules.rent_collectible && !rules.property_purchasable) {
    out.push(
      issue('RENT_REQUIRES_PURCHASE', '/rent_collectible', 'rent needs purchasable properties', {
        hint: 'enable property_purchasable or disable rent_collectible',
        fields: ['rent_collectible', 'property_purchasable'],
      }),
    );
  }

  if (rules.combat_enabled && rules.tiles_per_side === 0) {
    out.push(
      issue('COMBAT_REQUIRES_BOARD', '/combat_enabled', 'combat needs a board (tiles_per_side > 0)', {
        fields: ['combat_enabled', 'tiles_per_side'],
      }),
    );
  }

  if (rules.ship_placement && !rules.combat_enabled) {
    out.push(
      issue('SHIP_PLACEMENT_REQUIRES_COMBAT', '/ship_placement', 'ship placement needs combat', {
        fields: ['ship_placement', 'combat_enabled'],
      }),
    );
  }

  if (rules.bankruptcy_enabled && !rules.currency_enabled) {
    out.push(
      issue('BANKRUPTCY_REQUIRES_CURRENCY', '/bankruptcy_enabled', 'bankruptcy needs currency', {
        fields: ['bankruptcy_enabled', 'currency_enabled'],
      }),
    );
  }

  if (rules.win_condition === 'balance_threshold' && !rules.currency_enabled) {
    out.push(
      issue('BALANCE_WIN_REQUIRES_CURRENCY', '/win_condition', 'a balance win needs currency', {
        fields: ['win_condition', 'currency_enabled'],
      }),
    );
  }

  if (rules.duplicates_grant_extra_turn && rules.duplicates_required > rules.dice_count) {
    out.push(
      issue(
        'DUPLICATES_EXCEED_DICE',
        '/duplicates_required',
        `cannot roll ${rules.duplicates_required} matching faces with ${rules.dice_count} dice`,
        { fields: ['duplicates_required', 'dice_count'] },
      ),
    );
  }

  if (rules.resources_enabled) {
    const names = rules.resource_names;
    if (names.length !== rules.resource_count || names.some((n) => n.trim() === '')) {
      out.push(
        issue('RESOURCE_NAMES_MISMATCH', '/resource_names', 'resource_names must list resource_count non-blank names', {
          fields: ['resource_names', 'resource_count'],
        }),
      );
    }
  }

  return out;
}

/** 不致命但大概率是写错了的组合 */
export function check_warnings(rules: RulesType): ValidationIssue[] {
  const out: ValidationIssue[] = [];

  if (rules.property_tradable && rules.separate_boards) {
    out.push(
      issue('TRADE_ON_SEPARATE_BOARDS', '/property_tradable', 'properties are traded across separate boards', {
        fields: ['property_tradable', 'separate_boards'],
      }),
    );
  }

  if (!rules.can_see_enemy_tokens && rules.enemy_visibility_range !== -1) {
    out.push(
      issue('TOKENS_FULLY_HIDDEN', '/enemy_visibility_range', 'enemy_visibility_range has no effect while tokens are hidden', {
        fields: ['can_see_enemy_tokens', 'enemy_visibility_range'],
      }),
    );
  }

  const can_eliminate = rules.combat_enabled || (rules.bankruptcy_enabled && rules.rent_collectible);
  if (rules.win_condition === 'elimination' && !can_eliminate) {
    out.push(
      issue('ELIMINATION_UNREACHABLE', '/win_condition', 'no rule can eliminate a player, so the match cannot be won', {
        hint: 'enable combat, or bankruptcy with rent',
        fields: ['win_condition', 'combat_enabled', 'bankruptcy_enabled'],
      }),
    );
  }

  if (rules.currency_enabled && rules.starting_balance === 0) {
    out.push(issue('NO_STARTING_BALANCE', '/starting_balance', 'players start with no money'));
  }

  return out;
}
