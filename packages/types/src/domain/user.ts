/**
 * User Domain Types
 *
 * Accounts are managed by Better Auth; nickname and anonymous are
 * additional fields on its user table.
 */

/** User as returned by the API */
export type User = {
  id: string;
  name: string;
  email: string;
  nickname: string | null;
  /** Default anonymity for new entries */
  anonymous: boolean;
  createdAt?: string;
  updatedAt?: string;
};
