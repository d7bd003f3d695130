import type { Strategy } from '../strategy';

/** 总是选第一个候选（move 永远排在最前） */
export const first_strategy: Strategy = {
  choose(intents) {
    return intents[0] ?? null;
  },
};
