import { betterAuth } from 'better-auth';
import { bearer } from 'better-auth/plugins';
import { config } from '../config/default.ts';
import { getDatabase } from '../utils/database.ts';

// =============================================================================
// Additional Field Definitions
// =============================================================================

/** User additional fields added via betterAuth config */
const userAdditionalFields = {
  nickname: {
    type: 'string',
    required: false,
    input: true,
  },
  anonymous: {
    type: 'boolean',
    required: false,
    defaultValue: false,
    input: true,
  },
} as const;

/**
 * Email/password accounts with bearer-token sessions. Clients send the
 * session token returned by sign-up/sign-in as `Authorization: Bearer`.
 */
export const auth = betterAuth({
  database: getDatabase(),
  secret: config.secretKey,
  baseURL: config.server.publicUrl,
  basePath: '/api/auth',
  emailAndPassword: {
    enabled: true,
    minPasswordLength: 8,
    autoSignIn: true,
  },
  user: {
    additionalFields: userAdditionalFields,
  },
  plugins: [bearer()],
});

export type Session = typeof auth.$Infer.Session;
