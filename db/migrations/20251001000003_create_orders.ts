import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // No foreign key to customers: bulk loads arrive unordered, and the
  // report drops unresolved references through its inner joins.
  await knex.schema.createTable('orders', (table) => {
    table.bigInteger('order_id').primary();
    table.bigInteger('customer_id');
    table.timestamp('order_date', { useTz: true });
    table.string('status', 16);
    table.specificType('currency', 'char(3)');
    table.string('payment_method', 16);
    table.string('shipping_country', 64);
    table.decimal('discount', 10, 2);
    table.decimal('total_amount', 12, 2);

    table.index(['customer_id'], 'idx_orders_customer');
    table.index(['order_date'], 'idx_orders_date');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('orders');
}
