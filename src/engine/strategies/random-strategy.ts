import type { Strategy } from '../strategy';

export const random_strategy: Strategy = {
  choose(intents, ctx) {
    if (intents.length === 0) return null;
    const idx = ctx.rng.next_uint32() % intents.length;
    return intents[idx] ?? null;
  },
};
