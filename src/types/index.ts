export * from './issue.type';
export * from './analysis.type';
export * from './match.type';
export * from './event.type';
export * from './resolve.type';
export * from './compose.type';
