import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('order_items', (table) => {
    table.bigInteger('order_item_id').primary();
    table.bigInteger('order_id');
    table.bigInteger('product_id');
    table.integer('quantity');
    table.decimal('unit_price', 10, 2);
    table.decimal('line_total', 12, 2);

    table.index(['order_id'], 'idx_items_order');
    table.index(['product_id'], 'idx_items_product');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('order_items');
}
