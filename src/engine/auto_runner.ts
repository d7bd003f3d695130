/**
 * 自动对局运行器（Auto Runner）
 * 在给定规则与策略下批量自我对弈，产出终局/未终局、步数、
 * 无法行动次数、策略违规次数、意图命中与胜负原因统计，以及可选事件轨迹。
 */
import type { IntentKind, IntentType } from '../schema';
import type { ComposeInput, MatchEvent, VictoryReason } from '../types';
import { mix_seed, mulberry32 } from '../utils/rng.util';
import { compose_match } from '../composer';
import { roll_dice } from './dice';
import { legal_intents } from './legal_intents';
import { resolve_intent } from './resolver';
import type { Strategy } from './strategy';
import { first_strategy } from './strategies';

const DICE_SALT = 3;
const STRATEGY_SALT = 4;

/**
 * 自动运行器的配置项
 * - strategies 按玩家 id 对应；越界或缺省回退到 first_strategy
 */
export interface AutoRunnerOptions {
  rules: unknown;
  /** 缺省用分析器推荐的人数 */
  players?: number;
  episodes: number;
  /** 每局步数上限（默认 200） */
  max_steps?: number;
  /** 第 ep 局的种子 = seed + ep */
  seed?: number;
  strategies?: Strategy[];
  /** 为 true 时收集每局的事件轨迹 */
  collect_trajectory?: boolean;
}

export interface AutoRunnerSummary {
  episodes: number;
  steps: number;
  /** 以 match_over 结束的局数 */
  finished: number;
  /** 走满步数仍未结束的局数 */
  unfinished: number;
  /** 没有候选意图或策略返回 null 而结束的局数 */
  no_action: number;
  /** 策略抛错而终止的局数 */
  violations: number;
  /** 被 resolver 拒绝而终止的局数 */
  rejected: number;
  /** 胜者 id → 局数（无胜者记为 "none"） */
  winners: Record<string, number>;
  reasons: Partial<Record<VictoryReason, number>>;
  intent_hits: Partial<Record<IntentKind, number>>;
  episode_steps: number[];
  trajectories?: MatchEvent[][];
}

function bump<K extends string>(map: Partial<Record<K, number>>, key: K): void {
  map[key] = (map[key] ?? 0) + 1;
}

/**
 * 基于策略的自动运行器：
 * - 每步掷骰，通过 legal_intents 枚举候选意图
 * - 由当前玩家对应的 Strategy 选择
 * - 无候选或 Strategy 返回 null：记 no_action 并结束该局
 * - Strategy.choose 抛错：记 violations 并终止该局
 */
export function auto_runner(opts: AutoRunnerOptions): AutoRunnerSummary {
  const { rules, players, episodes, max_steps = 200, seed = 0, strategies = [], collect_trajectory } = opts;

  let steps = 0;
  let finished = 0;
  let unfinished = 0;
  let no_action = 0;
  let violations = 0;
  let rejected = 0;
  const winners: Record<string, number> = {};
  const reasons: AutoRunnerSummary['reasons'] = {};
  const intent_hits: AutoRunnerSummary['intent_hits'] = {};
  const episode_steps: number[] = [];
  const trajectories: MatchEvent[][] = [];

  for (let ep = 0; ep < episodes; ep++) {
    const ep_seed = (seed + ep) >>> 0;
    const input: ComposeInput = { rules, players, seed: ep_seed };
    const composed = compose_match(input);
    if (!composed.ok) {
      throw new Error(`COMPOSE_FAILED: ${JSON.stringify(composed.errors)}`);
    }
    const match = composed.match;
    const dice_rng = mulberry32(mix_seed(ep_seed, DICE_SALT));
    const strategy_rng = mulberry32(mix_seed(ep_seed, STRATEGY_SALT));

    const events: MatchEvent[] = [];
    if (collect_trajectory) trajectories.push(events);

    let ep_steps = 0;
    let ended = false;
    for (let i = 0; i < max_steps; i++) {
      const player = match.current_player;

      // 1) 掷骰并列举候选意图
      const roll = roll_dice(match.rules, dice_rng);
      const intents = legal_intents(match, roll);
      if (intents.length === 0) { no_action++; ended = true; break; }

      // 2) 当前玩家的策略做决策
      const strat = strategies[player] ?? first_strategy;
      let next: IntentType | null = null;
      try {
        next = strat.choose(intents, { player, match, rng: strategy_rng });
      } catch {
        violations++;
        ended = true;
        break;
      }
      if (!next) { no_action++; ended = true; break; }

      // 3) 结算
      const r = resolve_intent(match, { ...next, seq: match.last_seq + 1 });
      if (!r.ok) { rejected++; ended = true; break; }

      bump(intent_hits, next.kind);
      steps++;
      ep_steps++;
      if (collect_trajectory) events.push(...r.events);

      // 4) 终局
      if (match.phase === 'match_over') {
        finished++;
        const key = match.winner === null ? 'none' : String(match.winner);
        winners[key] = (winners[key] ?? 0) + 1;
        for (const e of r.events) {
          if (e.type === 'match_over') bump(reasons, e.reason);
        }
        ended = true;
        break;
      }
    }
    if (!ended) unfinished++;
    episode_steps.push(ep_steps);
  }

  return {
    episodes,
    steps,
    finished,
    unfinished,
    no_action,
    violations,
    rejected,
    winners,
    reasons,
    intent_hits,
    episode_steps,
    trajectories: collect_trajectory ? trajectories : undefined,
  };
}
