/**
 * Entry Domain Types
 *
 * Entries are the improvement ideas a team collects and ranks.
 */

/** Effort needed to implement an entry's solution */
export type Effort = 'low' | 'medium' | 'high';

/** Every accepted effort value, cheapest first */
export const EFFORT_LEVELS: ReadonlyArray<Effort> = ['low', 'medium', 'high'];

/** Fields that feed the priority score */
export type PriorityInputs = {
  manualOverridePrio: number;
  timeSavedPerYear: number | null;
  grossProfitPerYear: number | null;
  effort: Effort | null;
};

/** Public author summary attached to non-anonymous entries */
export type EntryAuthor = {
  id: string;
  name: string;
  nickname: string | null;
};

/** Entry as returned by the API */
export type Entry = {
  id: string;
  teamId: string;
  /** Omitted for anonymous entries unless the viewer is the author */
  userId?: string;
  problem: string;
  solution: string;
  area: string;
  /** Estimated hours saved per year */
  timeSavedPerYear: number | null;
  /** Estimated gross profit per year in currency units */
  grossProfitPerYear: number | null;
  effort: Effort;
  monetaryExplanation: string;
  link: string | null;
  anonymous: boolean;
  /** User-supplied bias added to the computed score */
  manualOverridePrio: number;
  /** Ranking score, higher sorts first */
  finalPrio: number;
  createdAt: string;
  updatedAt: string;
  /** Set while the entry is soft-deleted */
  deletedAt: string | null;
  user?: EntryAuthor;
};
