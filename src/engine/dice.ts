import type { RulesType } from '../schema';
import type { EngineError } from '../types';
import { next_int } from '../utils/rng.util';
import type { Rng } from '../utils/rng.util';

export interface DiceRoll {
  faces: number[];
  total: number;
  /** 满足重复点数奖励：本回合结束后同一玩家再行动一次 */
  extra_turn: boolean;
}

/**
 * 重复点数规则：开启时，任一点数出现次数 ≥ duplicates_required 即奖励一回合。
 * 关闭时永远 false。
 */
export function grants_extra_turn(rules: RulesType, faces: number[]): boolean {
  if (!rules.duplicates_grant_extra_turn) return false;
  const counts = new Map<number, number>();
  for (const f of faces) counts.set(f, (counts.get(f) ?? 0) + 1);
  for (const c of counts.values()) {
    if (c >= rules.duplicates_required) return true;
  }
  return false;
}

/** 掷 dice_count 颗 dice_sides 面骰 */
export function roll_dice(rules: RulesType, rng: Rng): DiceRoll {
  const faces: number[] = [];
  for (let i = 0; i < rules.dice_count; i++) faces.push(next_int(rng, 1, rules.dice_sides));
  const total = faces.reduce((a, b) => a + b, 0);
  return { faces, total, extra_turn: grants_extra_turn(rules, faces) };
}

/**
 * 校验 move 意图里携带的骰面：颗数、点数范围、点数和 = spaces。
 * 通过返回 null。
 */
export function check_dice(rules: RulesType, faces: number[], spaces: number): EngineError | null {
  if (faces.length !== rules.dice_count) {
    return {
      code: 'DICE_MISMATCH',
      message: `expected ${rules.dice_count} dice, got ${faces.length}`,
      details: { faces },
    };
  }
  const bad = faces.find((f) => f < 1 || f > rules.dice_sides);
  if (bad !== undefined) {
    return {
      code: 'DICE_MISMATCH',
      message: `die face ${bad} is outside 1..${rules.dice_sides}`,
      details: { faces },
    };
  }
  const total = faces.reduce((a, b) => a + b, 0);
  if (total !== spaces) {
    return {
      code: 'DICE_MISMATCH',
      message: `dice total ${total} does not match spaces ${spaces}`,
      details: { faces, spaces },
    };
  }
  return null;
}

/**
 * 没带骰面的 move：spaces 必须是骰子能掷出的点数和，
 * 即 [dice_count, dice_count × dice_sides]。通过返回 null。
 */
export function check_spaces(rules: RulesType, spaces: number): EngineError | null {
  const min = rules.dice_count;
  const max = rules.dice_count * rules.dice_sides;
  if (spaces < min || spaces > max) {
    return {
      code: 'DICE_MISMATCH',
      message: `spaces ${spaces} is outside ${min}..${max}`,
      details: { spaces, min, max },
    };
  }
  return null;
}
