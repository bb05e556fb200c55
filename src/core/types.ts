/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every dependency that is registered by value or behind an interface gets a
 * Symbol token here. Concrete classes that tsyringe can build from their own
 * constructor metadata (QueryTranslator, ResultAggregator, the strategy
 * factory) are resolved by class and need no token.
 */
export const TOKENS = {
  // Infrastructure
  Knex: Symbol.for('Knex'),
  Logger: Symbol.for('Logger'),

  // Settings slices of the validated config
  SearchSettings: Symbol.for('SearchSettings'),
  PayUnitPolicy: Symbol.for('PayUnitPolicy'),

  // Repositories
  CompensationRepository: Symbol.for('CompensationRepository'),

  // ETL: the function that runs an ingestion in a worker thread
  EtlRunner: Symbol.for('EtlRunner'),

  // Services
  SearchService: Symbol.for('SearchService'),
  IngestionService: Symbol.for('IngestionService'),
} as const;
