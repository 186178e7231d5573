import Database from "better-sqlite3";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS interactions (
  id               TEXT PRIMARY KEY,
  user_id          TEXT NOT NULL,
  text             TEXT NOT NULL,
  interaction_type TEXT NOT NULL CHECK(interaction_type IN ('message','preference','feedback','behavior','explicit','implicit')),
  occurred_at      INTEGER NOT NULL,
  sentiment        REAL,
  topics           TEXT,
  domains          TEXT,
  intent           TEXT CHECK(intent IN ('statement','question','preference','other')),
  recorded_at      INTEGER NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_interactions_user ON interactions(user_id, occurred_at);

CREATE TABLE IF NOT EXISTS learned_facts (
  id                TEXT PRIMARY KEY,
  user_id           TEXT NOT NULL,
  category          TEXT NOT NULL CHECK(category IN ('preference','interest','behavior','temporal')),
  fact_key          TEXT NOT NULL,
  value             TEXT NOT NULL,
  confidence        TEXT NOT NULL CHECK(confidence IN ('low','medium','high')),
  evidence_count    INTEGER NOT NULL CHECK(evidence_count >= 1),
  supporting_ids    TEXT NOT NULL DEFAULT '[]',
  first_seen        INTEGER NOT NULL,
  last_updated      INTEGER NOT NULL,
  review            TEXT NOT NULL DEFAULT 'pending' CHECK(review IN ('pending','confirmed','rejected')),
  reviewed_at       INTEGER,
  UNIQUE (user_id, category, fact_key)
);
CREATE INDEX IF NOT EXISTS idx_facts_user ON learned_facts(user_id, category);

CREATE TABLE IF NOT EXISTS pattern_snapshots (
  user_id     TEXT PRIMARY KEY,
  summary     TEXT NOT NULL,
  insights    TEXT NOT NULL DEFAULT '[]',
  computed_at INTEGER NOT NULL
);
`;

export class LearningDB {
  private db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  /** Runs fn inside one SQLite transaction. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
