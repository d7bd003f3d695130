import { describe, it, expect } from 'vitest';
import { race } from '../../presets';
import { legal_intents } from '../legal_intents';
import { resolve_intent } from '../resolver';
import { build_match, modules_of } from './fixtures';

const roll = { faces: [1, 2], total: 3, extra_turn: false };

describe('legal_intents', () => {
  it('should list move, purchase and trade candidates in a fixed order', () => {
    const match = build_match(
      { property_purchasable: true, property_tradable: true },
      { players: 2, properties: [{ position: 3, price: 500 }, { position: 7, price: 200 }] },
    );
    const property = modules_of(match).property;
    if (!property) throw new Error('no property module');
    match.roster.get(1).position = 7;
    property.purchase(1, 7);
    match.roster.get(0).position = 3;

    expect(legal_intents(match, roll)).toEqual([
      { kind: 'move', player: 0, spaces: 3, dice: [1, 2] },
      { kind: 'purchase', player: 0, position: 3 },
      { kind: 'trade', player: 0, from_player: 1, to_player: 0, position: 7, price: 200 },
    ]);
  });

  it('should list answers instead of new offers while an offer waits', () => {
    const match = build_match(
      { property_purchasable: true, property_tradable: true },
      { players: 2, properties: [{ position: 7, price: 200 }] },
    );
    const property = modules_of(match).property;
    if (!property) throw new Error('no property module');
    match.roster.get(1).position = 7;
    property.purchase(1, 7);
    match.roster.get(0).position = 3;

    resolve_intent(match, { kind: 'trade', player: 0, from_player: 1, to_player: 0, position: 7, price: 200 });
    // 发起方自己没有可答复的东西，也不能再报价
    expect(legal_intents(match, roll)).toEqual([{ kind: 'move', player: 0, spaces: 3, dice: [1, 2] }]);

    resolve_intent(match, { kind: 'move', player: 0, spaces: 3, dice: [1, 2] });
    expect(match.current_player).toBe(1);
    expect(legal_intents(match, roll)).toEqual([
      { kind: 'move', player: 1, spaces: 3, dice: [1, 2] },
      { kind: 'accept', player: 1, offer_id: 1 },
      { kind: 'reject', player: 1, offer_id: 1 },
    ]);

    match.roster.get(0).balance = 100;
    expect(legal_intents(match, roll).map((i) => i.kind)).toEqual(['move', 'reject']);
  });

  it('should offer an attack on every other active player when combat is on', () => {
    const match = build_match({ currency_enabled: false, combat_enabled: true, tiles_per_side: 20 }, { players: 3 });
    match.roster.deactivate(1);
    expect(legal_intents(match, roll).filter((i) => i.kind === 'attack')).toEqual([
      { kind: 'attack', player: 0, target: 2 },
    ]);
  });

  it('should produce intents the resolver accepts', () => {
    const match = build_match(race, { players: 2 });
    for (const intent of legal_intents(match, roll)) {
      expect(resolve_intent(match, intent).ok).toBe(true);
    }
  });

  it('should be empty once the match is over', () => {
    const match = build_match(race, { players: 2 });
    match.roster.get(0).position = 18;
    resolve_intent(match, { kind: 'move', player: 0, spaces: 1 });
    expect(match.phase).toBe('match_over');
    expect(legal_intents(match, roll)).toEqual([]);
  });
});
