import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('products', (table) => {
    table.bigInteger('product_id').primary();
    table.string('category', 64);
    table.string('subcategory', 64);
    table.string('brand', 64);
    table.decimal('price', 10, 2);
    table.decimal('cost', 10, 2);
    table.date('created_at');
    table.boolean('is_active');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('products');
}
