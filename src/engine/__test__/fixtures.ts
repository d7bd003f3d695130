import { compose_match } from '../../composer';
import type { RulesInput } from '../../schema';
import type { MatchEvent, MatchEventBody, MatchModules, MatchState, PropertyLayoutEntry } from '../../types';
import type { Rng } from '../../utils/rng.util';

/** 组装一局；失败直接抛错（测试里只用合法规则） */
export function build_match(
  rules: RulesInput,
  opts: { players?: number; seed?: number; properties?: PropertyLayoutEntry[] } = {},
): MatchState {
  const r = compose_match({ rules, ...opts });
  if (!r.ok) throw new Error(`compose failed: ${JSON.stringify(r.errors)}`);
  return r.match;
}

export function modules_of(match: MatchState): MatchModules {
  if (!match.modules) throw new Error('match has no modules');
  return match.modules;
}

export function types_of(events: Array<MatchEvent | MatchEventBody>): string[] {
  return events.map((e) => e.type);
}

/** 按给定序列吐出 uint32 的假随机源；序列用完后一直返回 0 */
export function scripted_rng(values: number[] = []): Rng {
  let i = 0;
  return {
    next_uint32(): number {
      const v = values[i] ?? 0;
      i++;
      return v;
    },
    get state(): number {
      return i;
    },
  };
}
