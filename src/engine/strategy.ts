import type { IntentType } from '../schema';
import type { MatchState } from '../types';
import type { Rng } from '../utils/rng.util';

export interface StrategyContext {
  player: number;
  match: MatchState;
  /** 策略自己的随机流（由对局种子派生，保证可复现） */
  rng: Rng;
}

export interface Strategy {
  choose(intents: IntentType[], ctx: StrategyContext): IntentType | null;
}
