export * from './roster';
export * from './board';
export * from './currency';
export * from './property';
export * from './combat';
export * from './movement';
