export * from './responses.ts';
export * from './auth.ts';
export * from './team.ts';
export * from './entry.ts';
