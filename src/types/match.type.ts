import type { RulesType } from '../schema';
import type { BoardModel } from '../engine/modules/board';
import type { CombatModel } from '../engine/modules/combat';
import type { CurrencyLedger } from '../engine/modules/currency';
import type { MovementModel } from '../engine/modules/movement';
import type { PropertyRegistry } from '../engine/modules/property';
import type { Roster } from '../engine/modules/roster';
import type { Archetype } from './analysis.type';
import type { MatchEventBody } from './event.type';

export type BoardShape = 'linear_loop' | 'square_grid';

export interface BoardTopology {
  shape: BoardShape;
  /** 线性位置总数：环形为格数，方格为 tiles_per_side² */
  size: number;
  tiles_per_side: number;
}

export interface PlayerState {
  /** 稳定整数 id（0..n-1），也是回合顺序 */
  id: number;
  position: number;
  balance: number;
  active: boolean;
  /** 升序；必须与 owner === id 的地产集合一致 */
  owned_positions: number[];
  health: number;
}

export interface PropertyRecord {
  position: number;
  name: string;
  price: number;
  rent: number;
  /** null = 无主 */
  owner: number | null;
}

/** 待对方答复的交易报价（同一时间只有一份） */
export interface TradeOffer {
  /** 每局从 1 递增；accept/reject 必须带上它 */
  id: number;
  proposer: number;
  /** 卖方 */
  from_player: number;
  /** 买方，付 price */
  to_player: number;
  position: number;
  price: number;
}

export interface CombatRecord {
  player_id: number;
  health: number;
  max_health: number;
  /** 由 health > 0 计算得出 */
  alive: boolean;
}

export type MatchPhase = 'awaiting_intent' | 'resolving' | 'match_over' | 'aborted';

/** 按规则开启的模块集合；未开启的为 null */
export interface MatchModules {
  board: BoardModel;
  movement: MovementModel;
  currency: CurrencyLedger | null;
  property: PropertyRegistry | null;
  combat: CombatModel | null;
}

/**
 * 单局的全部可变状态。
 * 由 composer 创建，只被 resolver 修改；中止后 modules 置为 null。
 */
export interface MatchState {
  readonly rules: RulesType;
  readonly rules_id: string;
  readonly archetype: Archetype;
  readonly seed: number;
  readonly topology: BoardTopology;
  readonly roster: Roster;
  modules: MatchModules | null;
  phase: MatchPhase;
  current_player: number;
  /** 每轮（所有存活玩家各行动一次）+1 */
  turn: number;
  last_seq: number;
  winner: number | null;
  /** 当前结算中的事件缓冲 */
  outbox: MatchEventBody[];
}

/** 对外只读快照（纯 JSON，不含任何内部引用） */
export interface MatchSnapshot {
  archetype: Archetype;
  rules_id: string;
  phase: MatchPhase;
  turn: number;
  current_player: number;
  last_seq: number;
  winner: number | null;
  topology: BoardTopology;
  modules: Record<keyof MatchModules, boolean>;
  players: PlayerState[];
  properties: PropertyRecord[];
  trade_offer: TradeOffer | null;
  combat: CombatRecord[];
}
