import { z } from 'zod';

/**
 * 玩家意图（Intent）的结构校验。
 * 只校验形状；是否轮到该玩家、功能是否开启、资金是否足够等由 resolver 判断。
 */

const PlayerId = z.number().int().min(0);
const Position = z.number().int().min(0);

const IntentBase = z.object({
  /** 发起意图的玩家（网络层已完成身份认证） */
  player: PlayerId,
  /** 可选去重序号：若提供必须等于 last_seq + 1 */
  seq: z.number().int().min(1).optional(),
});

/**
 * 前进 spaces 格；带 dice 时各面之和必须等于 spaces，
 * 不带时 spaces 必须落在骰子能掷出的范围内。
 */
const MoveIntent = IntentBase.extend({
  kind: z.literal('move'),
  spaces: z.number().int().min(1),
  dice: z.array(z.number().int().min(1)).min(1).optional(),
});

/** 购买地产；position 缺省为玩家当前位置 */
const PurchaseIntent = IntentBase.extend({
  kind: z.literal('purchase'),
  position: Position.optional(),
});

/**
 * 发起交易报价：to_player 付 price 给 from_player，地产从 from_player 转给 to_player。
 * 报价要等另一方 accept 才成交。
 */
const TradeIntent = IntentBase.extend({
  kind: z.literal('trade'),
  from_player: PlayerId,
  to_player: PlayerId,
  position: Position,
  price: z.number().int().min(0),
});

/** 应答待定报价；可以不在自己的回合提交 */
const AcceptIntent = IntentBase.extend({
  kind: z.literal('accept'),
  offer_id: z.number().int().min(1),
});

/** 拒绝报价（应答方）或撤回报价（发起方） */
const RejectIntent = IntentBase.extend({
  kind: z.literal('reject'),
  offer_id: z.number().int().min(1),
});

const AttackIntent = IntentBase.extend({
  kind: z.literal('attack'),
  target: PlayerId,
});

export const Intent = z.discriminatedUnion('kind', [
  MoveIntent,
  PurchaseIntent,
  TradeIntent,
  AcceptIntent,
  RejectIntent,
  AttackIntent,
]);

export type IntentType = z.infer<typeof Intent>;
export type IntentKind = IntentType['kind'];
export type MoveIntentType = z.infer<typeof MoveIntent>;
export type PurchaseIntentType = z.infer<typeof PurchaseIntent>;
export type TradeIntentType = z.infer<typeof TradeIntent>;
export type AcceptIntentType = z.infer<typeof AcceptIntent>;
export type RejectIntentType = z.infer<typeof RejectIntent>;
export type AttackIntentType = z.infer<typeof AttackIntent>;

/** 安全解析意图 */
export function parse_intent(input: unknown) {
  return Intent.safeParse(input);
}
