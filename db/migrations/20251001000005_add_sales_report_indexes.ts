import type { Knex } from 'knex';

/**
 * Covering indexes for the trailing-window sales report: the window scan on
 * orders and the item lookup by order can both be answered from the index.
 */
export async function up(knex: Knex): Promise<void> {
  await knex.schema.alterTable('orders', (table) => {
    table.index(
      ['order_date', 'order_id', 'customer_id', 'shipping_country'],
      'idx_orders_date_cover',
    );
  });

  await knex.schema.alterTable('order_items', (table) => {
    table.index(
      ['order_id', 'product_id', 'quantity', 'line_total'],
      'idx_items_order_cover',
    );
  });

  await knex.schema.alterTable('products', (table) => {
    table.index(['product_id', 'category'], 'idx_products_category');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.alterTable('products', (table) => {
    table.dropIndex(['product_id', 'category'], 'idx_products_category');
  });

  await knex.schema.alterTable('order_items', (table) => {
    table.dropIndex(['order_id', 'product_id', 'quantity', 'line_total'], 'idx_items_order_cover');
  });

  await knex.schema.alterTable('orders', (table) => {
    table.dropIndex(
      ['order_date', 'order_id', 'customer_id', 'shipping_country'],
      'idx_orders_date_cover',
    );
  });
}
