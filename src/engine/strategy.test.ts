import { describe, it, expect } from 'vitest';
import { race } from '../presets';
import type { IntentType } from '../schema';
import { build_match, scripted_rng } from './__test__/fixtures';
import { first_strategy, random_strategy } from './strategies';
import type { Strategy } from './strategy';

const intents: IntentType[] = [
  { kind: 'move', player: 0, spaces: 3 },
  { kind: 'attack', player: 0, target: 1 },
  { kind: 'attack', player: 0, target: 2 },
];

describe('built-in strategies', () => {
  const match = build_match(race, { players: 3 });

  it('first_strategy picks the first candidate', () => {
    const strat: Strategy = first_strategy;
    expect(strat.choose(intents, { player: 0, match, rng: scripted_rng() })).toEqual(intents[0]);
  });

  it('random_strategy picks with the context rng', () => {
    const chosen = random_strategy.choose(intents, { player: 0, match, rng: scripted_rng([5]) });
    expect(chosen).toEqual(intents[2]);
  });

  it('both return null without candidates', () => {
    expect(first_strategy.choose([], { player: 0, match, rng: scripted_rng() })).toBeNull();
    expect(random_strategy.choose([], { player: 0, match, rng: scripted_rng() })).toBeNull();
  });
});
