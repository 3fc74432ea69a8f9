/**
 * Entry API Types
 */

import type { Effort, Entry } from '../domain/entry.ts';

export interface CreateEntryRequest {
  problem: string;
  solution: string;
  area: string;
  timeSavedPerYear?: number | null;
  grossProfitPerYear?: number | null;
  effort: Effort;
  monetaryExplanation: string;
  link?: string | null;
  anonymous?: boolean;
  manualOverridePrio?: number;
}

/** Partial update; absent keys keep their stored value */
export type UpdateEntryRequest = Partial<CreateEntryRequest>;

export interface ListEntriesQuery {
  area?: string;
}

export interface EntryResponse {
  entry: Entry;
}

export interface ListEntriesResponse {
  entries: Entry[];
}

export interface RestoreEntryResponse {
  message: string;
  entry: Entry;
}
