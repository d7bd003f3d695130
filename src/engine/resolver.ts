import { parse_intent } from '../schema';
import type {
  AcceptIntentType,
  AttackIntentType,
  IntentType,
  MoveIntentType,
  PurchaseIntentType,
  RejectIntentType,
  TradeIntentType,
} from '../schema';
import type {
  EngineError,
  IntentErrorCode,
  MatchEvent,
  MatchModules,
  MatchState,
  OpResult,
  ResolveOutput,
} from '../types';
import { check_dice, check_spaces, grants_extra_turn } from './dice';
import type { MoveResult } from './modules/movement';
import type { PropertyRegistry } from './modules/property';
import { state_hash } from './snapshot';
import { end_turn } from './turn';
import { validate_match } from './validate';
import { eval_victory } from './victory';

/** 构造 EngineError 的小工具（统一结构） */
function err(code: IntentErrorCode, message: string, details?: unknown): EngineError {
  return { code, message, details };
}

/** 单个意图的执行结果：是否消耗本回合、是否获得额外回合 */
interface Applied {
  ends_turn: boolean;
  /** 触发重复点数奖励的骰面；null = 无额外回合 */
  extra_dice: number[] | null;
  move: MoveResult | null;
}

type ApplyResult = { ok: true; applied: Applied } | { ok: false; error: EngineError };

const FREE_ACTION: Applied = { ends_turn: false, extra_dice: null, move: null };

function from_op(r: OpResult, applied: Applied): ApplyResult {
  return r.ok ? { ok: true, applied } : r;
}

/**
 * 移动的固定顺序：
 * 移动 → 经过起点奖励 → 检查点奖励 → 地产落点 → 战斗落点
 * 前一步让玩家出局时，后面的落点结算跳过。
 */
function apply_move(match: MatchState, modules: MatchModules, intent: MoveIntentType): ApplyResult {
  const { rules, roster } = match;
  const bad = intent.dice ? check_dice(rules, intent.dice, intent.spaces) : check_spaces(rules, intent.spaces);
  if (bad) return { ok: false, error: bad };

  const move = modules.movement.move(intent.player, intent.spaces);
  modules.currency?.resolve_checkpoint(intent.player, move.to);
  modules.property?.land_on(intent.player, move.to);
  if (roster.is_active(intent.player)) {
    modules.combat?.resolve_landing(intent.player, move.to);
  }

  const extra_dice = intent.dice && grants_extra_turn(rules, intent.dice) ? intent.dice : null;
  return { ok: true, applied: { ends_turn: true, extra_dice, move } };
}

function apply_purchase(match: MatchState, modules: MatchModules, intent: PurchaseIntentType): ApplyResult {
  if (!modules.property) return { ok: false, error: err('FEATURE_DISABLED', 'property module is not enabled') };
  const player = match.roster.get(intent.player);
  const position = intent.position ?? player.position;
  if (position !== player.position) {
    return {
      ok: false,
      error: err('INVALID_TARGET', `player ${intent.player} is not standing on ${position}`, {
        position,
        player_position: player.position,
      }),
    };
  }
  return from_op(modules.property.purchase(intent.player, position), FREE_ACTION);
}

/** 交易开着才返回登记处 */
function trade_registry(match: MatchState, modules: MatchModules): PropertyRegistry | null {
  return match.rules.property_tradable ? modules.property : null;
}

const TRADING_DISABLED: ApplyResult = { ok: false, error: err('FEATURE_DISABLED', 'property trading is disabled') };

function apply_trade(match: MatchState, modules: MatchModules, intent: TradeIntentType): ApplyResult {
  const registry = trade_registry(match, modules);
  if (!registry) return TRADING_DISABLED;
  const { player, from_player, to_player, position, price } = intent;
  return from_op(registry.propose(player, from_player, to_player, position, price), FREE_ACTION);
}

function apply_answer(match: MatchState, modules: MatchModules, intent: AcceptIntentType | RejectIntentType): ApplyResult {
  const registry = trade_registry(match, modules);
  if (!registry) return TRADING_DISABLED;
  const r =
    intent.kind === 'accept'
      ? registry.accept(intent.player, intent.offer_id)
      : registry.reject(intent.player, intent.offer_id);
  return from_op(r, FREE_ACTION);
}

function apply_attack(modules: MatchModules, intent: AttackIntentType): ApplyResult {
  if (!modules.combat) return { ok: false, error: err('FEATURE_DISABLED', 'combat module is not enabled') };
  return from_op(modules.combat.attack(intent.player, intent.target), { ends_turn: true, extra_dice: null, move: null });
}

function apply_intent(match: MatchState, modules: MatchModules, intent: IntentType): ApplyResult {
  switch (intent.kind) {
    case 'move':
      return apply_move(match, modules, intent);
    case 'purchase':
      return apply_purchase(match, modules, intent);
    case 'trade':
      return apply_trade(match, modules, intent);
    case 'accept':
    case 'reject':
      return apply_answer(match, modules, intent);
    case 'attack':
      return apply_attack(modules, intent);
  }
}

/**
 * resolve_intent()
 * ----------------
 * 对局的唯一写入口。阶段：awaiting_intent → resolving → awaiting_intent | match_over。
 *  - 被拒绝的意图返回 { ok:false, error }，对局状态不变
 *  - 被接受的意图：结算 → 胜负判定 → 推进回合 → 不变量检查 → 返回带 seq 的事件与状态哈希
 *  - 不变量被破坏属于程序缺陷，直接抛错
 */
export function resolve_intent(match: MatchState, input: unknown): ResolveOutput {
  // 校验 1：阶段
  if (match.phase === 'aborted') return { ok: false, error: err('MATCH_ABORTED', 'match was aborted') };
  if (match.phase === 'match_over') {
    return { ok: false, error: err('MATCH_OVER', 'match is over', { winner: match.winner }) };
  }
  if (match.phase === 'resolving') {
    return { ok: false, error: err('RESOLVER_BUSY', 'another intent is being resolved') };
  }
  const modules = match.modules;
  if (!modules) return { ok: false, error: err('MATCH_ABORTED', 'match modules are torn down') };

  // 校验 2：形状
  const parsed = parse_intent(input);
  if (!parsed.success) {
    return {
      ok: false,
      error: err('INVALID_INTENT', 'intent failed validation', {
        issues: parsed.error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })),
      }),
    };
  }
  const intent = parsed.data;

  // 校验 3：序号必须严格递增 1
  const seq = match.last_seq + 1;
  if (intent.seq !== undefined && intent.seq !== seq) {
    return {
      ok: false,
      error: err('DUPLICATE_SEQ', 'seq must be last_seq + 1', { last_seq: match.last_seq, got: intent.seq }),
    };
  }

  // 校验 4：只有当前玩家能提交意图；报价的应答不受回合限制（是否当事人由登记处判断）
  const answers_offer = intent.kind === 'accept' || intent.kind === 'reject';
  if (!answers_offer && intent.player !== match.current_player) {
    return {
      ok: false,
      error: err('OUT_OF_TURN', `it is player ${match.current_player}'s turn`, {
        expected: match.current_player,
        actual: intent.player,
      }),
    };
  }

  match.phase = 'resolving';
  match.outbox.length = 0;

  const r = apply_intent(match, modules, intent);
  if (!r.ok) {
    match.outbox.length = 0;
    match.phase = 'awaiting_intent';
    return r;
  }
  const { applied } = r;

  const victory = eval_victory(match, intent.player, applied.move);
  if (victory) {
    match.phase = 'match_over';
    match.winner = victory.winner_id;
    match.outbox.push({ type: 'match_over', winner_id: victory.winner_id, reason: victory.reason });
  } else {
    match.phase = 'awaiting_intent';
    if (applied.ends_turn) {
      if (applied.extra_dice && match.roster.is_active(intent.player)) {
        match.outbox.push({ type: 'extra_turn_granted', player_id: intent.player, dice: [...applied.extra_dice] });
      } else {
        end_turn(match);
      }
    }
  }
  match.last_seq = seq;

  const v = validate_match(match);
  if (v.errors.length) {
    throw new Error(`INVARIANT_FAILED: ${JSON.stringify(v.errors)}`);
  }

  const events: MatchEvent[] = match.outbox.splice(0).map((e) => ({ ...e, seq }));
  return { ok: true, events, phase: match.phase, state_hash: state_hash(match) };
}

/**
 * 中止对局：发出 match_aborted，拆除全部模块。
 * 已中止的对局再次中止返回 MATCH_ABORTED。
 */
export function abort_match(match: MatchState, reason: string): ResolveOutput {
  if (match.phase === 'aborted') return { ok: false, error: err('MATCH_ABORTED', 'match was already aborted') };
  match.phase = 'aborted';
  match.modules = null;
  match.outbox.length = 0;
  return {
    ok: true,
    events: [{ type: 'match_aborted', reason, seq: match.last_seq }],
    phase: match.phase,
    state_hash: state_hash(match),
  };
}
