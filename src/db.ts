import pool from "./config/db";
import type { AnswerLogEntry } from "./types";

export async function init(): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS answer_logs (
      id SERIAL PRIMARY KEY,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      question TEXT NOT NULL,
      category TEXT NOT NULL,
      answer TEXT NOT NULL,
      source TEXT NOT NULL,
      fallback BOOLEAN NOT NULL,
      quality DOUBLE PRECISION NOT NULL,
      elapsed_ms INTEGER NOT NULL
    );
  `);
}

export async function logAnswer(entry: AnswerLogEntry): Promise<void> {
  const values = [
    entry.question,
    entry.category,
    entry.answer,
    entry.source,
    entry.fallback,
    entry.quality,
    Math.round(entry.elapsedMs)
  ];

  await pool.query(
    `INSERT INTO answer_logs (question, category, answer, source, fallback, quality, elapsed_ms)
     VALUES ($1, $2, $3, $4, $5, $6, $7)`,
    values
  );
}

export default pool;
