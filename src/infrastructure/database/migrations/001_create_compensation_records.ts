/**
 * Migration 001 — Create the `compensation_records` Table
 * Layer: Infrastructure (Database)
 *
 * One row per canonical CompensationRecord. Rows are append-only; `id` exists
 * only for stable ordering and is not part of the domain.
 *
 *   - `salary_amount` is DOUBLE PRECISION so aggregates come back as JS numbers.
 *   - `pay_unit` is constrained to the closed PayUnit set.
 *   - `title_terms` / `location_terms` hold the search-simplified text written
 *     by the repository; the tsvector columns derived from them are filled by
 *     the trigger in migration 002.
 *   - A CHECK keeps the location invariant (city or state) in the table too.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('compensation_records', (table) => {
    table.increments('id').primary();
    table.text('job_title').notNullable();
    table.double('salary_amount').notNullable();
    table
      .enu('pay_unit', ['HOURLY', 'WEEKLY', 'BIWEEKLY', 'MONTHLY', 'YEARLY'], {
        useNative: false,
        enumName: 'pay_unit',
      })
      .notNullable();
    table.string('city', 200);
    table.string('state', 100);
    table.text('title_terms').notNullable();
    table.text('location_terms').notNullable();

    table.specificType('title_vector', 'TSVECTOR');
    table.specificType('location_vector', 'TSVECTOR');

    table.timestamp('created_at', { useTz: true }).notNullable().defaultTo(knex.fn.now());

    table.index('pay_unit', 'idx_compensation_records_pay_unit');
    table.index('state', 'idx_compensation_records_state');
  });

  await knex.raw(`
    ALTER TABLE compensation_records
    ADD CONSTRAINT chk_compensation_records_salary_positive CHECK (salary_amount > 0),
    ADD CONSTRAINT chk_compensation_records_location CHECK (city IS NOT NULL OR state IS NOT NULL)
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('compensation_records');
}
