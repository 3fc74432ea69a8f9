export * from './entry.ts';
export * from './team.ts';
export * from './user.ts';
