/**
 * Migration 002 — Full-Text Vectors, GIN Indexes & Trigger
 * Layer: Infrastructure (Database)
 *
 * Title and location are separate tsvectors so a word from the location query
 * can never satisfy the title predicate (and vice versa).
 *
 * The 'simple' text search configuration is used on purpose: it lower-cases
 * and splits on non-word characters but does not stem or drop stop words, so
 * "engineer" matches "engineer" and a city called "Of" stays searchable. The
 * input to to_tsvector is already accent-folded and stripped of punctuation by
 * the repository (title_terms / location_terms), mirroring what the query
 * translator does to user input.
 *
 * The trigger keeps both vectors in step on INSERT or UPDATE; GIN indexes turn
 * each `@@` predicate into an index lookup instead of a sequential scan.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.raw(`
    CREATE OR REPLACE FUNCTION compensation_records_vector_trigger() RETURNS trigger AS $$
    BEGIN
      NEW.title_vector := to_tsvector('simple', COALESCE(NEW.title_terms, ''));
      NEW.location_vector := to_tsvector('simple', COALESCE(NEW.location_terms, ''));
      RETURN NEW;
    END
    $$ LANGUAGE plpgsql
  `);

  await knex.raw(`
    CREATE TRIGGER trg_compensation_records_vectors
    BEFORE INSERT OR UPDATE ON compensation_records
    FOR EACH ROW
    EXECUTE FUNCTION compensation_records_vector_trigger()
  `);

  await knex.raw(`
    CREATE INDEX idx_compensation_records_title_vector
    ON compensation_records USING GIN (title_vector)
  `);

  await knex.raw(`
    CREATE INDEX idx_compensation_records_location_vector
    ON compensation_records USING GIN (location_vector)
  `);
}

export async function down(knex: Knex): Promise<void> {
  await knex.raw('DROP INDEX IF EXISTS idx_compensation_records_location_vector');
  await knex.raw('DROP INDEX IF EXISTS idx_compensation_records_title_vector');
  await knex.raw('DROP TRIGGER IF EXISTS trg_compensation_records_vectors ON compensation_records');
  await knex.raw('DROP FUNCTION IF EXISTS compensation_records_vector_trigger()');
}
