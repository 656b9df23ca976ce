import type { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("payments", (table) => {
    table.increments("id").primary();
    // RESTRICT: an order is never deleted while a payment points at it
    table
      .integer("order_id")
      .notNullable()
      .references("id")
      .inTable("orders")
      .onDelete("RESTRICT");
    table.decimal("amount", 12, 2).notNullable();
    table.string("phone_number", 15).notNullable();
    table.string("provider", 20).notNullable();
    table
      .string("status", 20)
      .notNullable()
      .defaultTo("PENDING")
      .comment("PENDING | COMPLETED | FAILED | REFUNDED");
    table.string("transaction_id", 100).nullable().unique();
    table
      .timestamp("applied_at", { useTz: true })
      .nullable()
      .comment("set once the amount is credited to orders.amount_paid");
    table.timestamps(true, true);

    table.index(["order_id", "status"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("payments");
}
