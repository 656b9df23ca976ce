import type { Knex } from "knex";
import * as initSchema from "../../migrations/20261001_init_schema.js";
import * as payments from "../../migrations/20261008_payments.js";
import * as awaitingGateway from "../../migrations/20261015_payments_awaiting_gateway.js";

type Migration = Knex.Migration & { name: string };

// Listed statically so the same migrations run from tsx, the compiled build
// and the test runner without knex scanning the filesystem.
const MIGRATIONS: Migration[] = [
  { name: "20261001_init_schema", up: initSchema.up, down: initSchema.down },
  { name: "20261008_payments", up: payments.up, down: payments.down },
  {
    name: "20261015_payments_awaiting_gateway",
    up: awaitingGateway.up,
    down: awaitingGateway.down,
  },
];

export const migrationSource: Knex.MigrationSource<Migration> = {
  async getMigrations() {
    return MIGRATIONS;
  },
  getMigrationName(migration) {
    return migration.name;
  },
  async getMigration(migration) {
    return migration;
  },
};
