import { describe, it, expect } from 'vitest';
import { race, trading } from '../presets';
import { auto_runner } from './auto_runner';
import { random_strategy } from './strategies';
import type { Strategy } from './strategy';

describe('auto_runner', () => {
  it('should finish every race episode at the goal', () => {
    const summary = auto_runner({ rules: race, episodes: 3 });
    expect(summary.episodes).toBe(3);
    expect(summary.finished).toBe(3);
    expect(summary.unfinished).toBe(0);
    expect(summary.no_action).toBe(0);
    expect(summary.violations).toBe(0);
    expect(summary.rejected).toBe(0);
    expect(summary.reasons).toEqual({ reach_goal: 3 });
    expect(summary.intent_hits).toEqual({ move: summary.steps });
    expect(summary.episode_steps.reduce((a, b) => a + b, 0)).toBe(summary.steps);
    expect(summary.trajectories).toBeUndefined();
  });

  it('should be reproducible for the same seed', () => {
    const opts = { rules: trading, players: 3, episodes: 2, max_steps: 60, seed: 9, strategies: [random_strategy, random_strategy, random_strategy] };
    expect(auto_runner(opts)).toEqual(auto_runner(opts));
  });

  it('should count episodes that hit the step limit', () => {
    const summary = auto_runner({ rules: trading, episodes: 1, max_steps: 1 });
    expect(summary.unfinished).toBe(1);
    expect(summary.finished).toBe(0);
    expect(summary.steps).toBe(1);
    expect(summary.episode_steps).toEqual([1]);
  });

  it('should count a throwing strategy as a violation', () => {
    const broken: Strategy = {
      choose() {
        throw new Error('boom');
      },
    };
    const summary = auto_runner({ rules: race, players: 2, episodes: 1, strategies: [broken] });
    expect(summary.violations).toBe(1);
    expect(summary.steps).toBe(0);
  });

  it('should count a strategy that passes as no_action', () => {
    const idle: Strategy = { choose: () => null };
    const summary = auto_runner({ rules: race, players: 2, episodes: 1, strategies: [idle] });
    expect(summary.no_action).toBe(1);
    expect(summary.finished).toBe(0);
  });

  it('should collect event trajectories on request', () => {
    const summary = auto_runner({ rules: race, players: 2, episodes: 2, collect_trajectory: true });
    expect(summary.trajectories).toHaveLength(2);
    expect(summary.trajectories?.[0]?.[0]?.type).toBe('player_moved');
  });

  it('should throw when the rules cannot build a match', () => {
    expect(() => auto_runner({ rules: { property_tradable: true }, episodes: 1 })).toThrow(/COMPOSE_FAILED/);
  });
});
