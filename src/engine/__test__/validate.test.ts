import { describe, it, expect } from 'vitest';
import { trading } from '../../presets';
import { validate_match } from '../validate';
import { build_match, modules_of } from './fixtures';

describe('validate_match', () => {
  it('should pass a freshly composed match', () => {
    const match = build_match(trading, { seed: 3 });
    expect(validate_match(match)).toEqual({ errors: [], warnings: [] });
  });

  it('should report owned_positions that disagree with the records', () => {
    const match = build_match(trading, { players: 2, properties: [{ position: 5, price: 100 }] });
    match.roster.get(0).owned_positions = [5];
    expect(validate_match(match).errors.map((e) => e.code)).toEqual(['INVARIANT_OWNED_SYNC']);
  });

  it('should report records owned by inactive players', () => {
    const match = build_match(trading, { players: 3, properties: [{ position: 5, price: 100 }] });
    modules_of(match).property?.purchase(1, 5);
    match.roster.deactivate(1);
    expect(validate_match(match).errors.map((e) => e.code)).toEqual(['INVARIANT_OWNER_INACTIVE']);
  });

  it('should report negative balances, positions off the board and dead active players', () => {
    const match = build_match({ combat_enabled: true, tiles_per_side: 20 }, { players: 2 });
    match.roster.get(0).balance = -1;
    match.roster.get(0).position = 20;
    match.roster.get(1).health = 0;
    expect(validate_match(match).errors.map((e) => e.code)).toEqual([
      'INVARIANT_BALANCE_NEGATIVE',
      'INVARIANT_POSITION_RANGE',
      'INVARIANT_DEAD_ACTIVE',
    ]);
  });

  it('should report an inactive current player while awaiting an intent', () => {
    const match = build_match(trading, { players: 2 });
    match.roster.deactivate(0);
    expect(validate_match(match).errors.map((e) => e.code)).toEqual(['INVARIANT_CURRENT_INACTIVE']);
  });
});
