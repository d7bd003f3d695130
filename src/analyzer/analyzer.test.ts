import { describe, it, expect } from 'vitest';
import { PRESETS, PRESET_NAMES, preset_rules } from '../presets';
import { RuleConfiguration } from '../schema';
import { analyze_document, analyze_rules, classify_archetype, describe_rules, recommended_players } from './index';

const rules = (input: Record<string, unknown>) => RuleConfiguration.parse(input);

describe('analyze_rules archetypes', () => {
  it('should classify every preset without conflicts or warnings', () => {
    const got = PRESET_NAMES.map((name) => {
      const a = analyze_rules(preset_rules(name));
      return [name, a.archetype, a.valid, a.conflicts.length, a.warnings.length];
    });
    expect(got).toEqual([
      ['trading', 'trading', true, 0, 0],
      ['grid_combat', 'grid_combat', true, 0, 0],
      ['race', 'race', true, 0, 0],
      ['hybrid', 'hybrid', true, 0, 0],
      ['speed_trading', 'trading', true, 0, 0],
      ['naval_warfare', 'grid_combat', true, 0, 0],
    ]);
  });

  it('should prefer grid_combat over trading when both predicates hold', () => {
    const r = rules({ separate_boards: true, ship_placement: true, combat_enabled: true, property_purchasable: true });
    expect(classify_archetype(r)).toBe('grid_combat');
  });

  it('should fall back to hybrid when no archetype matches', () => {
    expect(analyze_rules(rules({})).archetype).toBe('hybrid');
    expect(analyze_rules(rules({ currency_enabled: false, combat_enabled: true })).archetype).toBe('hybrid');
  });
});

describe('analyze_rules conflicts', () => {
  it('should fail closed with hybrid-invalid and name the conflicting fields', () => {
    const a = analyze_rules(rules({ ...PRESETS.grid_combat, property_tradable: true }));
    expect(a.archetype).toBe('hybrid');
    expect(a.valid).toBe(false);
    expect(a.conflicts).toEqual([
      {
        code: 'TRADE_REQUIRES_PURCHASE',
        path: '/property_tradable',
        message: 'trading needs purchasable properties',
        hint: 'enable property_purchasable or disable property_tradable',
        fields: ['property_tradable', 'property_purchasable'],
      },
    ]);
  });

  it('should report every conflict it finds', () => {
    const a = analyze_rules(
      rules({
        currency_enabled: false,
        rent_collectible: true,
        combat_enabled: true,
        tiles_per_side: 0,
        bankruptcy_enabled: true,
        win_condition: 'balance_threshold',
        dice_count: 1,
        duplicates_grant_extra_turn: true,
        resources_enabled: true,
        resource_count: 2,
        resource_names: ['Ore'],
      }),
    );
    expect(a.conflicts.map((c) => c.code)).toEqual([
      'RENT_REQUIRES_PURCHASE',
      'COMBAT_REQUIRES_BOARD',
      'BANKRUPTCY_REQUIRES_CURRENCY',
      'BALANCE_WIN_REQUIRES_CURRENCY',
      'DUPLICATES_EXCEED_DICE',
      'RESOURCE_NAMES_MISMATCH',
    ]);
    expect(a.archetype).toBe('hybrid');
  });

  it('should flag ship placement without combat', () => {
    const a = analyze_rules(rules({ separate_boards: true, ship_placement: true }));
    expect(a.valid).toBe(false);
    expect(a.conflicts.map((c) => c.code)).toEqual(['SHIP_PLACEMENT_REQUIRES_COMBAT']);
  });
});

describe('analyze_rules warnings', () => {
  it('should warn about likely mistakes without failing', () => {
    const a = analyze_rules(
      rules({
        separate_boards: true,
        tiles_per_side: 8,
        property_purchasable: true,
        property_tradable: true,
        can_see_enemy_tokens: false,
        enemy_visibility_range: 3,
        starting_balance: 0,
      }),
    );
    expect(a.valid).toBe(true);
    expect(a.warnings.map((w) => w.code)).toEqual([
      'TRADE_ON_SEPARATE_BOARDS',
      'TOKENS_FULLY_HIDDEN',
      'ELIMINATION_UNREACHABLE',
      'NO_STARTING_BALANCE',
    ]);
  });
});

describe('analyze_rules purity', () => {
  it('should give identical output for identical input', () => {
    const r = preset_rules('hybrid');
    expect(analyze_rules(r)).toEqual(analyze_rules(r));
  });

  it('should give the same rules_id regardless of key order', () => {
    const a = analyze_rules(rules({ tiles_per_side: 12, dice_count: 1 }));
    const b = analyze_rules(rules({ dice_count: 1, tiles_per_side: 12 }));
    expect(a.rules_id).toBe(b.rules_id);
    expect(a.rules_id).not.toBe(analyze_rules(rules({ tiles_per_side: 13, dice_count: 1 })).rules_id);
  });
});

describe('recommended_players', () => {
  it('should follow the archetype and stay within the rule bounds', () => {
    expect(recommended_players(preset_rules('trading'), 'trading')).toBe(4);
    expect(recommended_players(preset_rules('grid_combat'), 'grid_combat')).toBe(2);
    expect(recommended_players(rules({ min_players: 3, max_players: 5 }), 'grid_combat')).toBe(3);
    expect(recommended_players(rules({ max_players: 6 }), 'hybrid')).toBe(6);
  });
});

describe('analyze_document', () => {
  it('should wrap schema failures as SCHEMA_ERROR issues', () => {
    const r = analyze_document({ dice_sides: 1 });
    expect(r.ok).toBe(false);
    expect(r.rules).toBeNull();
    expect(r.errors.map((e) => [e.code, e.path])).toEqual([['SCHEMA_ERROR', '/dice_sides']]);
  });

  it('should return conflicts as errors with the parsed rules', () => {
    const r = analyze_document({ property_tradable: true });
    expect(r.ok).toBe(false);
    expect(r.analysis?.valid).toBe(false);
    expect(r.errors.map((e) => e.code)).toEqual(['TRADE_REQUIRES_PURCHASE']);
  });

  it('should accept a valid document', () => {
    const r = analyze_document(PRESETS.race);
    expect(r.ok).toBe(true);
    if (r.ok) expect(r.analysis.archetype).toBe('race');
  });
});

describe('describe_rules', () => {
  it('should summarise the trading preset', () => {
    expect(describe_rules(preset_rules('trading'))).toEqual([
      'archetype: trading',
      'board: 40-space loop',
      'currency: start 1500, pass bonus 200',
      'property: trade on, rent on, bankruptcy on',
      'combat: off',
      'players: 2-6',
      'win: elimination',
      'dice: 2d6, extra turn on 2 matching',
    ]);
  });

  it('should summarise the hybrid preset', () => {
    expect(describe_rules(preset_rules('hybrid'))).toEqual([
      'archetype: hybrid',
      'board: 6x6 grid per player',
      'currency: start 1000, pass bonus 100',
      'property: trade off, rent on, bankruptcy on',
      'combat: every 7 spaces, health 100',
      'players: 2-4',
      'win: balance_threshold 3000',
      'dice: 2d6',
      'resources: Wood, Stone, Wheat (cap 10)',
    ]);
  });

  it('should list conflicts', () => {
    expect(describe_rules(rules({ property_tradable: true })).slice(-2)).toEqual([
      'conflict: TRADE_REQUIRES_PURCHASE',
      'warning: ELIMINATION_UNREACHABLE',
    ]);
  });
});
