import { describe, it, expect } from 'vitest';
import type { MatchEventBody } from '../../../types';
import { mulberry32 } from '../../../utils/rng.util';
import type { Rng } from '../../../utils/rng.util';
import { scripted_rng } from '../../__test__/fixtures';
import { CombatModel } from '../combat';
import type { CombatOptions } from '../combat';
import { Roster } from '../roster';

const OPTIONS: CombatOptions = {
  max_health: 100,
  combat_interval: 7,
  separate_boards: false,
  environment_damage: { min: 5, max: 19 },
  landing_damage: { min: 10, max: 29 },
  attack_damage: { min: 15, max: 34 },
};

function setup(players: number, options: Partial<CombatOptions> = {}, rng: Rng = scripted_rng()) {
  const roster = Roster.seed(players, 0, 100);
  const events: MatchEventBody[] = [];
  const released: number[] = [];
  const combat = new CombatModel(
    roster,
    rng,
    (e) => events.push(e),
    (id) => {
      released.push(id);
    },
    { ...OPTIONS, ...options },
  );
  return { roster, combat, events, released };
}

describe('CombatModel.resolve_landing', () => {
  it('should only trigger on non-zero multiples of the interval', () => {
    const { combat, events } = setup(2);
    combat.resolve_landing(0, 0);
    combat.resolve_landing(0, 6);
    expect(events).toHaveLength(0);
    expect(combat.is_combat_space(14)).toBe(true);
  });

  it('should deal environment damage to the lander on separate boards', () => {
    // next_int(5, 19)：span 15，3 % 15 = 3 → 8
    const { roster, combat, events } = setup(2, { separate_boards: true }, scripted_rng([3]));
    combat.resolve_landing(0, 7);
    expect(events).toEqual([
      { type: 'combat_damage', source: 'environment', attacker_id: null, target_id: 0, damage: 8, health: 92 },
    ]);
    expect(roster.get(1).health).toBe(100);
  });

  it('should hit the nearest other active player, ties to the lowest id', () => {
    const { roster, combat, events } = setup(3);
    roster.get(0).position = 14;
    roster.get(1).position = 10;
    roster.get(2).position = 18;
    combat.resolve_landing(0, 14);
    expect(events).toEqual([
      { type: 'combat_damage', source: 'landing', attacker_id: 0, target_id: 1, damage: 10, health: 90 },
    ]);
  });

  it('should skip inactive opponents', () => {
    const { roster, combat, events } = setup(3);
    roster.get(0).position = 14;
    roster.get(1).position = 14;
    roster.get(2).position = 0;
    roster.deactivate(1);
    combat.resolve_landing(0, 14);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ target_id: 2 });
  });

  it('should do nothing without an opponent or for an inactive lander', () => {
    const { roster, combat, events } = setup(2);
    roster.deactivate(1);
    combat.resolve_landing(0, 7);
    combat.resolve_landing(1, 7);
    expect(events).toHaveLength(0);
  });
});

describe('CombatModel.attack', () => {
  it('should deal attack damage', () => {
    const { roster, combat, events } = setup(2);
    expect(combat.attack(0, 1)).toEqual({ ok: true });
    expect(roster.get(1).health).toBe(85);
    expect(events[0]).toEqual({ type: 'combat_damage', source: 'attack', attacker_id: 0, target_id: 1, damage: 15, health: 85 });
  });

  it('should reject attacking yourself or an inactive player', () => {
    const { roster, combat } = setup(3);
    roster.deactivate(2);
    const self = combat.attack(0, 0);
    const gone = combat.attack(0, 2);
    const unknown = combat.attack(0, 9);
    expect([self, gone, unknown].map((r) => (r.ok ? 'ok' : r.error.code))).toEqual([
      'INVALID_TARGET',
      'INVALID_TARGET',
      'INVALID_TARGET',
    ]);
  });

  it('should eliminate at zero health, release holdings and clamp health', () => {
    const { roster, combat, events, released } = setup(2, { attack_damage: { min: 60, max: 60 } });
    combat.attack(0, 1);
    combat.attack(0, 1);
    expect(roster.get(1).health).toBe(0);
    expect(roster.get(1).active).toBe(false);
    expect(released).toEqual([1]);
    expect(events.slice(1)).toEqual([
      { type: 'combat_damage', source: 'attack', attacker_id: 0, target_id: 1, damage: 60, health: 0 },
      { type: 'player_eliminated', player_id: 1, cause: 'combat', by: 0 },
    ]);
    expect(combat.record(1)).toEqual({ player_id: 1, health: 0, max_health: 100, alive: false });
  });
});

describe('CombatModel.heal', () => {
  it('should cap healing at max health', () => {
    const { combat, events } = setup(2);
    combat.attack(0, 1);
    expect(combat.heal(1, 50)).toBe(100);
    expect(events[1]).toEqual({ type: 'player_healed', player_id: 1, amount: 15, health: 100 });
  });

  it('should not revive an eliminated player', () => {
    const { combat } = setup(2, { attack_damage: { min: 100, max: 100 } });
    combat.attack(0, 1);
    expect(combat.heal(1, 50)).toBe(0);
  });
});

describe('CombatModel laws', () => {
  it('should keep alive === health > 0 and recompute has_player_won after every hit', () => {
    const { roster, combat } = setup(3, {}, mulberry32(2024));
    const pairs: Array<[number, number]> = [];
    for (let i = 0; i < 40; i++) pairs.push([i % 3, (i + 1) % 3]);

    for (const [a, t] of pairs) {
      if (!roster.is_active(a)) continue;
      combat.attack(a, t);
      for (const r of combat.records()) {
        expect(r.alive).toBe(r.health > 0);
        expect(r.health).toBeGreaterThanOrEqual(0);
        expect(r.health).toBeLessThanOrEqual(100);
      }
      const active = roster.active_players();
      for (const p of roster.players) {
        expect(combat.has_player_won(p.id)).toBe(active.length === 1 && active[0]?.id === p.id);
      }
    }
  });
});
