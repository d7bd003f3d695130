export { analyze_rules, analyze_document, describe_rules, classify_archetype, recommended_players } from './analyzer';
export { compose_match } from './composer';
export * from './engine';
export { parse_rules, parse_intent, serialize_rules, default_rules, RuleConfiguration, Intent } from './schema';
export type { RulesType, RulesInput, IntentType, IntentKind } from './schema';
export { PRESETS, PRESET_NAMES, preset_rules, is_preset_name } from './presets';
export type { PresetName } from './presets';
export type * from './types';
