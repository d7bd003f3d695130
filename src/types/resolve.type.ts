import type { MatchEvent } from './event.type';
import type { MatchPhase } from './match.type';

/** 意图被拒绝的原因（可恢复：对局状态不变，比赛继续） */
export type IntentErrorCode =
  | 'INVALID_INTENT'
  | 'OUT_OF_TURN'
  | 'MATCH_OVER'
  | 'MATCH_ABORTED'
  | 'RESOLVER_BUSY'
  | 'DUPLICATE_SEQ'
  | 'FEATURE_DISABLED'
  | 'INSUFFICIENT_FUNDS'
  | 'INVALID_TARGET'
  | 'NO_PROPERTY'
  | 'ALREADY_OWNED'
  | 'NOT_OWNER'
  | 'NOT_A_PARTY'
  | 'TRADE_PENDING'
  | 'NO_OFFER'
  | 'DICE_MISMATCH';

// 错误
export interface EngineError { code: IntentErrorCode; message: string; details?: unknown }

/** 可失败的模块操作：失败时保证没有任何写入 */
export type OpResult = { ok: true } | { ok: false; error: EngineError };

/** resolve_intent() 输出 */
export type ResolveOutput =
  | {
      ok: true;
      /** 本次结算产生的事件（按发生顺序） */
      events: MatchEvent[];
      /** 结算后的阶段（awaiting_intent 或 match_over） */
      phase: MatchPhase;
      /** 结算后快照的哈希（sha256:...），用于一致性校验与回放锚点 */
      state_hash: string;
    }
  | { ok: false; error: EngineError };
