import type { Knex } from "knex";

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable("customers", (table) => {
    table.increments("id").primary();
    table.string("name").notNullable();
    table.string("phone_number", 15).nullable();
    table.text("address").notNullable().defaultTo("");
    table.timestamps(true, true);
  });

  await knex.schema.createTable("products", (table) => {
    table.increments("id").primary();
    table.string("sku", 50).notNullable().unique();
    table.string("name", 200).notNullable();
    table.decimal("price", 12, 2).notNullable();
    table.integer("stock").notNullable().defaultTo(0);
    table.timestamps(true, true);
  });

  await knex.schema.createTable("orders", (table) => {
    table.increments("id").primary();
    table
      .integer("customer_id")
      .notNullable()
      .references("id")
      .inTable("customers")
      .onDelete("RESTRICT");
    table.decimal("amount", 12, 2).notNullable();
    table.decimal("amount_paid", 12, 2).notNullable().defaultTo(0);
    table
      .string("payment_status", 20)
      .notNullable()
      .defaultTo("UNPAID")
      .comment("UNPAID | PARTIALLY_PAID | PAID | REFUNDED");
    table
      .string("status", 20)
      .notNullable()
      .defaultTo("PENDING")
      .comment("PENDING | PROCESSING | SHIPPED | DELIVERED | CANCELLED");
    table.text("shipping_address").notNullable().defaultTo("");
    table.string("tracking_number", 30).nullable().unique();
    table.timestamps(true, true);

    table.index(["customer_id"]);
    table.index(["status"]);
    table.index(["payment_status"]);
    table.index(["created_at"]);
  });

  await knex.schema.createTable("order_items", (table) => {
    table.increments("id").primary();
    table
      .integer("order_id")
      .notNullable()
      .references("id")
      .inTable("orders")
      .onDelete("CASCADE");
    table
      .integer("product_id")
      .notNullable()
      .references("id")
      .inTable("products")
      .onDelete("RESTRICT");
    table.integer("quantity").notNullable();
    table.decimal("price_at_time", 12, 2).notNullable();

    table.unique(["order_id", "product_id"]);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists("order_items");
  await knex.schema.dropTableIfExists("orders");
  await knex.schema.dropTableIfExists("products");
  await knex.schema.dropTableIfExists("customers");
}
