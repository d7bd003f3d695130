import { describe, it, expect } from 'vitest';
import { RuleConfiguration } from '../../schema';
import { mulberry32 } from '../../utils/rng.util';
import { check_dice, check_spaces, grants_extra_turn, roll_dice } from '../dice';

const rules = (input: Record<string, unknown>) => RuleConfiguration.parse(input);

describe('roll_dice', () => {
  it('should roll dice_count faces within 1..dice_sides', () => {
    const r = rules({ dice_count: 3, dice_sides: 4 });
    const rng = mulberry32(5);
    for (let i = 0; i < 50; i++) {
      const roll = roll_dice(r, rng);
      expect(roll.faces).toHaveLength(3);
      expect(roll.faces.every((f) => f >= 1 && f <= 4)).toBe(true);
      expect(roll.total).toBe(roll.faces.reduce((a, b) => a + b, 0));
      expect(roll.extra_turn).toBe(false);
    }
  });

  it('should repeat for the same seed', () => {
    const r = rules({});
    const a = [roll_dice(r, mulberry32(77)), roll_dice(r, mulberry32(77))];
    expect(a[0]).toEqual(a[1]);
  });
});

describe('grants_extra_turn', () => {
  it('should need the rule and enough matching faces', () => {
    expect(grants_extra_turn(rules({ duplicates_grant_extra_turn: true }), [4, 4])).toBe(true);
    expect(grants_extra_turn(rules({ duplicates_grant_extra_turn: true }), [4, 5])).toBe(false);
    expect(grants_extra_turn(rules({}), [4, 4])).toBe(false);
    const triples = rules({ duplicates_grant_extra_turn: true, dice_count: 3, duplicates_required: 3 });
    expect(grants_extra_turn(triples, [2, 2, 5])).toBe(false);
    expect(grants_extra_turn(triples, [2, 2, 2])).toBe(true);
  });
});

describe('check_dice', () => {
  it('should accept faces that match the rules and the spaces', () => {
    expect(check_dice(rules({}), [6, 1], 7)).toBeNull();
  });

  it('should explain a mismatched total', () => {
    expect(check_dice(rules({}), [6, 1], 8)).toEqual({
      code: 'DICE_MISMATCH',
      message: 'dice total 7 does not match spaces 8',
      details: { faces: [6, 1], spaces: 8 },
    });
  });
});

describe('check_spaces', () => {
  it('should accept exactly the totals the dice can roll', () => {
    const r = rules({ dice_count: 2, dice_sides: 6 });
    expect(check_spaces(r, 2)).toBeNull();
    expect(check_spaces(r, 12)).toBeNull();
    expect(check_spaces(r, 1)).toEqual({
      code: 'DICE_MISMATCH',
      message: 'spaces 1 is outside 2..12',
      details: { spaces: 1, min: 2, max: 12 },
    });
    expect(check_spaces(r, 13)?.code).toBe('DICE_MISMATCH');
  });
});
