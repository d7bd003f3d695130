/**
 * 领域事件：表现层/网络广播只订阅这些事件，从不拿到 MatchState 的引用。
 * 每个事件都带玩家 id 与结算后的数值。
 */

export type DamageSource = 'environment' | 'landing' | 'attack';
export type EliminationCause = 'bankruptcy' | 'combat';
export type VictoryReason = 'last_player_standing' | 'balance_threshold' | 'reach_goal';

export type MatchEventBody =
  | { type: 'player_moved'; player_id: number; from: number; to: number; spaces: number }
  | { type: 'player_teleported'; player_id: number; from: number; to: number }
  | { type: 'passed_start'; player_id: number }
  | { type: 'pass_bonus_credited'; player_id: number; amount: number; balance: number }
  | { type: 'checkpoint_bonus_credited'; player_id: number; position: number; amount: number; balance: number }
  | { type: 'property_purchased'; player_id: number; position: number; price: number; balance: number }
  | { type: 'purchase_declined'; player_id: number; position: number; price: number; balance: number }
  | { type: 'rent_paid'; player_id: number; owner_id: number; position: number; amount: number; balance: number; owner_balance: number }
  | { type: 'rent_unpaid'; player_id: number; owner_id: number; position: number; amount: number; balance: number }
  | { type: 'player_bankrupt'; player_id: number; owner_id: number; position: number; amount: number; balance: number }
  | { type: 'property_released'; position: number; previous_owner: number }
  | { type: 'trade_proposed'; offer_id: number; proposer: number; from_player: number; to_player: number; position: number; price: number }
  | { type: 'trade_rejected'; offer_id: number; by: number | null }
  | { type: 'property_traded'; from_player: number; to_player: number; position: number; price: number; from_balance: number; to_balance: number }
  | { type: 'combat_damage'; source: DamageSource; attacker_id: number | null; target_id: number; damage: number; health: number }
  | { type: 'player_healed'; player_id: number; amount: number; health: number }
  | { type: 'player_eliminated'; player_id: number; cause: EliminationCause; by: number | null }
  | { type: 'extra_turn_granted'; player_id: number; dice: number[] }
  | { type: 'turn_advanced'; player_id: number; turn: number }
  | { type: 'match_over'; winner_id: number | null; reason: VictoryReason }
  | { type: 'match_aborted'; reason: string };

export type MatchEventType = MatchEventBody['type'];

/** 对外发布的事件：附带产生它的意图序号 */
export type MatchEvent = MatchEventBody & { seq: number };

/** 模块向对局写事件的出口 */
export type EventSink = (event: MatchEventBody) => void;
