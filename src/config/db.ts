import dotenv from "dotenv";
import { Pool } from "pg";
import { describeError, logger } from "../logger";

dotenv.config();

const connectionString = process.env.DATABASE_URL;

const pool = connectionString
  ? new Pool({ connectionString })
  : new Pool({
      host: process.env.PGHOST,
      port: process.env.PGPORT ? Number(process.env.PGPORT) : undefined,
      user: process.env.PGUSER,
      password: process.env.PGPASSWORD,
      database: process.env.PGDATABASE,
      ssl: process.env.PGSSLMODE === "require" ? { rejectUnauthorized: false } : undefined
    });

pool.on("error", (error: Error) => {
  logger.error("Unexpected PostgreSQL error", { error: describeError(error) });
});

export default pool;
