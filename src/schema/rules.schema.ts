import { z } from 'zod';
import { canonical_stringify } from '../utils/canonical.util';

/**
 * 规则文档（RuleConfiguration）的结构校验。
 *
 * - 扁平的 key-value 文档，按关注点分组（货币/棋盘/地产/战斗/可见性/人数/胜负/骰子/资源）
 * - 每个字段都有默认值：旧版本文档缺字段时直接补默认，不需要迁移逻辑
 * - 未知字段会被丢弃
 * 字段之间的一致性（trade ⇒ purchase 等）不在这里判断，交给 analyzer。
 */

const Int = (min: number) => z.number().int().min(min);

/** 伤害区间（闭区间，min ≤ max） */
const DamageRange = z
  .object({
    min: Int(0),
    max: Int(0),
  })
  .refine((r) => r.max >= r.min, {
    message: '伤害上限不能小于下限',
    path: ['max'],
  });

export const WIN_CONDITIONS = ['elimination', 'balance_threshold', 'reach_goal'] as const;

/** 早期存档里用的胜利条件名 → 当前枚举 */
const LEGACY_WIN_CONDITIONS: Record<string, (typeof WIN_CONDITIONS)[number]> = {
  LastPlayerStanding: 'elimination',
  EliminateAllEnemies: 'elimination',
  MoneyThreshold: 'balance_threshold',
  ReachGoal: 'reach_goal',
};

const WinCondition = z.preprocess(
  (v) => (typeof v === 'string' && Object.hasOwn(LEGACY_WIN_CONDITIONS, v) ? LEGACY_WIN_CONDITIONS[v] : v),
  z.enum(WIN_CONDITIONS),
);

export const RuleConfigurationBase = z.object({
  /** 文档自身的 schema 版本；新增字段只做加法 */
  schema_version: Int(1).default(1),

  // —— 货币
  currency_enabled: z.boolean().default(true),
  starting_balance: Int(0).default(1500),
  /** 经过起点时发放 */
  pass_bonus: Int(0).default(200),
  /** 0 表示关闭；停在非零倍数位置时发放 checkpoint_bonus */
  checkpoint_interval: Int(0).default(0),
  checkpoint_bonus: Int(0).default(0),

  // —— 棋盘
  /** true = 每人一张方格棋盘；false = 共享环形棋盘 */
  separate_boards: z.boolean().default(false),
  /** 0 表示无棋盘 */
  tiles_per_side: Int(0).default(40),

  // —— 地产
  property_purchasable: z.boolean().default(false),
  property_tradable: z.boolean().default(false),
  rent_collectible: z.boolean().default(false),
  bankruptcy_enabled: z.boolean().default(false),
  property_base_price: Int(0).default(100),
  property_price_step: Int(0).default(50),
  rent_percent: Int(0).default(10),

  // —— 战斗
  combat_enabled: z.boolean().default(false),
  ship_placement: z.boolean().default(false),
  starting_health: Int(1).default(100),
  combat_interval: Int(1).default(7),
  environment_damage: DamageRange.default({ min: 5, max: 19 }),
  landing_damage: DamageRange.default({ min: 10, max: 29 }),
  attack_damage: DamageRange.default({ min: 15, max: 34 }),

  // —— 可见性
  can_see_enemy_tokens: z.boolean().default(true),
  /** -1 = 不限距离 */
  enemy_visibility_range: Int(-1).default(-1),

  // —— 人数
  min_players: Int(1).default(2),
  max_players: Int(1).default(4),

  // —— 胜负
  win_condition: WinCondition.default('elimination'),
  win_balance_threshold: Int(1).default(5000),

  // —— 骰子
  dice_count: Int(1).default(2),
  dice_sides: Int(2).default(6),
  duplicates_grant_extra_turn: z.boolean().default(false),
  duplicates_required: Int(2).default(2),

  // —— 资源
  resources_enabled: z.boolean().default(false),
  resource_count: Int(0).default(0),
  resource_names: z.array(z.string()).default([]),
  /** null = 不设上限 */
  resource_cap: Int(1).nullable().default(null),
});

export const RuleConfiguration = RuleConfigurationBase.superRefine((rules, ctx) => {
  if (rules.max_players < rules.min_players) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: '最大人数不能小于最小人数',
      path: ['max_players'],
    });
  }
});

/** 解析后的完整规则（所有字段都有值） */
export type RulesType = z.output<typeof RuleConfiguration>;
/** 存档/网络侧传入的文档形状（字段均可缺省） */
export type RulesInput = z.input<typeof RuleConfiguration>;
export type WinConditionType = RulesType['win_condition'];
export type DamageRangeType = RulesType['attack_damage'];

/** 安全解析规则文档：成功返回 { success:true, data }；失败返回 { success:false, error } */
export function parse_rules(input: unknown) {
  return RuleConfiguration.safeParse(input);
}

/** 全部取默认值的规则 */
export function default_rules(): RulesType {
  return RuleConfiguration.parse({});
}

/**
 * 规则 → 存档文档（key 排序、null 字段省略）。
 * 省略的字段在 parse_rules 时回到默认值，所以 parse(serialize(r)) 与 r 等价。
 */
export function serialize_rules(rules: RulesType): string {
  return canonical_stringify(rules);
}
