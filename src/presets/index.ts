import { RuleConfiguration } from '../schema';
import type { RulesInput, RulesType } from '../schema';

/** 经典地产交易：共享 40 格环形棋盘，破产出局 */
export const trading = {
  currency_enabled: true,
  starting_balance: 1500,
  pass_bonus: 200,
  tiles_per_side: 40,
  property_purchasable: true,
  property_tradable: true,
  rent_collectible: true,
  bankruptcy_enabled: true,
  min_players: 2,
  max_players: 6,
  win_condition: 'elimination',
  dice_count: 2,
  dice_sides: 6,
  duplicates_grant_extra_turn: true,
  duplicates_required: 2,
} satisfies RulesInput;

/** 海战：每人一张 10×10 方格，看不见对方棋子 */
export const grid_combat = {
  currency_enabled: false,
  separate_boards: true,
  tiles_per_side: 10,
  combat_enabled: true,
  ship_placement: true,
  can_see_enemy_tokens: false,
  min_players: 2,
  max_players: 2,
  win_condition: 'elimination',
  dice_count: 1,
  dice_sides: 6,
} satisfies RulesInput;

/** 竞速：20 格环形，一颗骰子，先跑完一圈者胜 */
export const race = {
  currency_enabled: false,
  tiles_per_side: 20,
  min_players: 2,
  max_players: 4,
  win_condition: 'reach_goal',
  dice_count: 1,
  dice_sides: 6,
} satisfies RulesInput;

/** 混合：方格棋盘上同时有地产、战斗、检查点和资源 */
export const hybrid = {
  currency_enabled: true,
  starting_balance: 1000,
  pass_bonus: 100,
  checkpoint_interval: 10,
  checkpoint_bonus: 200,
  separate_boards: true,
  tiles_per_side: 6,
  property_purchasable: true,
  rent_collectible: true,
  bankruptcy_enabled: true,
  combat_enabled: true,
  enemy_visibility_range: 5,
  min_players: 2,
  max_players: 4,
  win_condition: 'balance_threshold',
  win_balance_threshold: 3000,
  dice_count: 2,
  dice_sides: 6,
  resources_enabled: true,
  resource_count: 3,
  resource_names: ['Wood', 'Stone', 'Wheat'],
  resource_cap: 10,
} satisfies RulesInput;

/** 快速交易：起始资金更多，先攒到 3000 者胜 */
export const speed_trading = {
  ...trading,
  starting_balance: 2000,
  pass_bonus: 300,
  win_condition: 'balance_threshold',
  win_balance_threshold: 3000,
} satisfies RulesInput;

/** 大海战：15×15 方格 */
export const naval_warfare = {
  ...grid_combat,
  tiles_per_side: 15,
} satisfies RulesInput;

export const PRESETS = {
  trading,
  grid_combat,
  race,
  hybrid,
  speed_trading,
  naval_warfare,
} satisfies Record<string, RulesInput>;

export type PresetName = keyof typeof PRESETS;

export const PRESET_NAMES = Object.keys(PRESETS).filter(is_preset_name);

export function is_preset_name(name: string): name is PresetName {
  return Object.hasOwn(PRESETS, name);
}

/** 取预设并补齐默认值 */
export function preset_rules(name: PresetName): RulesType {
  return RuleConfiguration.parse(PRESETS[name]);
}
