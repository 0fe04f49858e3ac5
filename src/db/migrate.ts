import type { Client, InStatement } from "@libsql/client";

const migrated = new WeakMap<Client, Promise<void>>();

/** Ejecuta la migración del esquema como máximo una vez por cliente. */
export function migrateOnce(db: Client): Promise<void> {
  let done = migrated.get(db);
  if (!done) {
    done = ensureSchema(db);
    migrated.set(db, done);
    // si falla, se reintenta en la siguiente llamada
    void done.catch(() => migrated.delete(db));
  }
  return done;
}

const SCHEMA: InStatement[] = [
  `CREATE TABLE IF NOT EXISTS qa_packs (
    name            TEXT PRIMARY KEY,
    categories      TEXT NOT NULL,
    threshold       REAL NOT NULL,
    max_rounds      INTEGER NOT NULL,
    status          TEXT NOT NULL DEFAULT 'ACTIVE' CHECK (status IN ('ACTIVE','ACCEPT','MAX_ROUNDS','FAILED')),
    reason          TEXT,
    failure_code    TEXT,
    failure_message TEXT,
    failed_round    INTEGER,
    started_at      TEXT NOT NULL,
    closed_at       TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS qa_rounds (
    pack_name      TEXT NOT NULL,
    round          INTEGER NOT NULL CHECK (round >= 1),
    started_at     TEXT NOT NULL,
    finished_at    TEXT NOT NULL,
    runtime_ms     INTEGER NOT NULL,
    overall_score  REAL NOT NULL CHECK (overall_score BETWEEN 0 AND 10),
    sub_scores     TEXT NOT NULL,
    critical       TEXT NOT NULL,
    selections     TEXT NOT NULL,
    deltas         TEXT NOT NULL,
    decision       TEXT NOT NULL CHECK (decision IN ('CONTINUE','STOP_ACCEPT','STOP_MAX_ROUNDS')),
    reason         TEXT NOT NULL,
    model          TEXT NOT NULL,
    authoritative  INTEGER NOT NULL,
    parameters     TEXT NOT NULL,
    PRIMARY KEY (pack_name, round),
    FOREIGN KEY (pack_name) REFERENCES qa_packs(name)
  )`,
  // las rondas solo se agregan, nunca se modifican
  `CREATE TRIGGER IF NOT EXISTS qa_rounds_no_update
    BEFORE UPDATE ON qa_rounds
    BEGIN
      SELECT RAISE(ABORT, 'qa_rounds is append-only');
    END`,
  `CREATE INDEX IF NOT EXISTS ix_packs_status ON qa_packs(status)`,
];

async function ensureSchema(db: Client): Promise<void> {
  await db.batch(SCHEMA, "write");
}
