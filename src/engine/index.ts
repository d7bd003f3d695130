export * from './modules';
export { roll_dice, grants_extra_turn, check_dice, check_spaces } from './dice';
export type { DiceRoll } from './dice';
export { MatchEventBus } from './events';
export type { ListenerErrorHandler, MatchEventListener, MatchEventOf } from './events';
export { eval_victory } from './victory';
export type { VictoryResult } from './victory';
export { validate_match } from './validate';
export { snapshot_match, state_hash } from './snapshot';
export { end_turn } from './turn';
export { resolve_intent, abort_match } from './resolver';
export { MatchSession, open_session } from './session';
export type { MatchSessionOptions, OpenSessionOutput } from './session';
export { legal_intents } from './legal_intents';
export { auto_runner } from './auto_runner';
export type { AutoRunnerOptions, AutoRunnerSummary } from './auto_runner';
export type { Strategy, StrategyContext } from './strategy';
export { first_strategy, random_strategy } from './strategies';
