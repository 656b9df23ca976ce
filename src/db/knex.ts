import knex, { type Knex } from "knex";
import { env } from "../config.js";
import { knexLog } from "./log.js";
import { migrationSource } from "./migrationSource.js";

export function createDb(connection: string = env.DATABASE_URL): Knex {
  return knex({
    client: "pg",
    connection,
    pool: { min: 0, max: 10 },
    migrations: {
      tableName: "knex_migrations",
      migrationSource,
    },
    log: knexLog,
  });
}

export const db: Knex = createDb();

export default db;
