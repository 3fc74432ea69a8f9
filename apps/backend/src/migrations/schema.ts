import type Database from 'better-sqlite3';

/**
 * Application tables. The `user` table they reference is created by
 * better-auth's migrator, which therefore runs first.
 */
export const APP_SCHEMA = `
  CREATE TABLE IF NOT EXISTS teams (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    team_code TEXT NOT NULL UNIQUE,
    invite_token TEXT UNIQUE,
    invite_expires_at TEXT,
    founder_user_id TEXT NOT NULL,
    settings TEXT NOT NULL DEFAULT '{}',
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (founder_user_id) REFERENCES user(id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS team_members (
    team_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    is_admin INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    PRIMARY KEY (team_id, user_id),
    FOREIGN KEY (team_id) REFERENCES teams(id) ON DELETE CASCADE,
    FOREIGN KEY (user_id) REFERENCES user(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_team_members_user ON team_members(user_id);

  CREATE TABLE IF NOT EXISTS entries (
    id TEXT PRIMARY KEY,
    team_id TEXT NOT NULL,
    user_id TEXT NOT NULL,
    problem TEXT NOT NULL,
    solution TEXT NOT NULL,
    area TEXT NOT NULL,
    time_saved_per_year INTEGER,
    gross_profit_per_year INTEGER,
    effort TEXT NOT NULL CHECK (effort IN ('low', 'medium', 'high')),
    monetary_explanation TEXT NOT NULL,
    link TEXT,
    anonymous INTEGER NOT NULL DEFAULT 0,
    manual_override_prio INTEGER NOT NULL DEFAULT 0,
    final_prio INTEGER NOT NULL,
    deleted_at TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (team_id) REFERENCES teams(id) ON DELETE CASCADE,
    FOREIGN KEY (user_id) REFERENCES user(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_entries_team_prio
    ON entries(team_id, deleted_at, final_prio DESC);
`;

/** Create the application tables on the given connection */
export function applyAppSchema(db: Database.Database): void {
  db.exec(APP_SCHEMA);
}
