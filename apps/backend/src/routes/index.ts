// Export routes
export { authRouter as authRoutes } from './authRoutes.ts';
export { entryRouter as entryRoutes } from './entryRoutes.ts';
export { statusRouter as statusRoutes } from './statusRoutes.ts';
export { teamRouter as teamRoutes } from './teamRoutes.ts';
export { userRouter as userRoutes } from './userRoutes.ts';
