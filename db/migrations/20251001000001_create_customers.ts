import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('customers', (table) => {
    table.bigInteger('customer_id').primary();
    table.string('first_name', 64);
    table.string('last_name', 64);
    table.string('email', 128);
    table.date('signup_date');
    table.string('country', 64);
    table.string('city', 64);
    table.boolean('marketing_opt_in');
    table.string('acquisition_source', 32);
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('customers');
}
