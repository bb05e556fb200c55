/**
 * Dependency Injection Container — The Central "Phone Book"
 * Layer: Core
 *
 * The single place where every dependency is wired. Each token is mapped to a
 * concrete value or class; when a class asks for TOKENS.Logger the container
 * looks the token up and hands back the registered object.
 *
 * How tsyringe works here:
 *   - `reflect-metadata` must be imported first: @inject / @injectable store
 *     constructor parameter metadata through the Reflect API.
 *   - `useValue` registers a pre-built object (logger, DB pool, config slices,
 *     the ETL runner function).
 *   - `useClass` constructs the class on resolve, injecting its own
 *     dependencies. Classes without a token (QueryTranslator,
 *     ResultAggregator, SearchStrategyFactory) are resolved by constructor.
 *
 * Tests override a token (usually CompensationRepository) by registering again
 * before the app is created; tsyringe resolves the last registration.
 */
import 'reflect-metadata';
import { container, Lifecycle } from 'tsyringe';

import { config } from './config';
import { logger } from './logger';
import { TOKENS } from './types';

import { IngestionService } from '@application/services/IngestionService';
import { SearchService } from '@application/services/SearchService';
import type { PayUnitPolicy } from '@domain/entities/PayUnit';
import { getDbConnection } from '@infrastructure/database/connection';
import { PostgresCompensationRepository } from '@infrastructure/repositories/PostgresCompensationRepository';
import type { SearchSettings } from '@shared/types';
import { type EtlRunner, runEtlWorker } from '@workers/etl/runEtlWorker';

container.register(TOKENS.Logger, { useValue: logger });
container.register(TOKENS.Knex, { useValue: getDbConnection() });
container.register<SearchSettings>(TOKENS.SearchSettings, { useValue: config.search });
container.register<PayUnitPolicy>(TOKENS.PayUnitPolicy, { useValue: config.payUnits });
container.register(TOKENS.CompensationRepository, { useClass: PostgresCompensationRepository });
container.register<EtlRunner>(TOKENS.EtlRunner, { useValue: runEtlWorker });
container.register(TOKENS.SearchService, { useClass: SearchService });
// Singleton: its in-flight guard must be shared by every request.
container.register(
  TOKENS.IngestionService,
  { useClass: IngestionService },
  { lifecycle: Lifecycle.Singleton },
);

export { container };
