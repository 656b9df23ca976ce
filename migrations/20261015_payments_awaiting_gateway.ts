import type { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.alterTable("payments", (table) => {
    table
      .boolean("awaiting_gateway")
      .notNullable()
      .defaultTo(false)
      .comment("true while the initiating request is still waiting on the gateway");
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable("payments", (table) => {
    table.dropColumn("awaiting_gateway");
  });
}
