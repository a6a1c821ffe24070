import path from 'node:path';
import { createStreamCatalog, type Logger, type StreamDefinition } from '@heartstore/shared';
import type { IngestionConfig } from './config/serviceConfig';
import { createIntradayExtractor } from './extract/intradayExtractor';
import { createSummaryExtractor } from './extract/summaryExtractor';
import { createBatchLoader } from './load/batchLoader';
import type { TableStore } from './load/tableStore';
import { createPipelineOrchestrator, type PipelineOrchestrator, type PipelineRunResult } from './pipeline/orchestrator';
import { createCacheReplaySource, type DayRecordSource } from './source/cacheReplaySource';
import { generateSyntheticCache } from './source/syntheticCache';
import { defaultTransformers } from './transform/transformers';

export const EXIT_LOADED = 0;
export const EXIT_FAILED = 1;
export const EXIT_NO_NEW_DATA = 2;
export const EXIT_CONFIG_ERROR = 78;

export type IngestionDependencies = {
  store: TableStore;
  logger: Logger;
  source?: DayRecordSource;
  clock?: { now(): Date };
};

export function createDayRecordSource(config: IngestionConfig, logger: Logger): DayRecordSource {
  const { cache } = config;
  return createCacheReplaySource({
    cachePath: path.join(cache.directory, cache.fileName),
    logger: logger.child({ component: 'cache-replay' }),
    regenerate: cache.regenerate
      ? () => generateSyntheticCache({ sampleIntervalSeconds: cache.sampleIntervalSeconds })
      : undefined
  });
}

export function streamsFor(config: IngestionConfig): StreamDefinition[] {
  return Object.values(createStreamCatalog({ intradayBatchSize: config.batchSize }));
}

/** Wires the extractors, transformers and loader for one configured entity. */
export function createIngestionPipeline(config: IngestionConfig, deps: IngestionDependencies): PipelineOrchestrator {
  const { store, logger } = deps;
  const source = deps.source ?? createDayRecordSource(config, logger);

  return createPipelineOrchestrator({
    streams: streamsFor(config),
    extractors: [
      createIntradayExtractor({
        source,
        entityId: config.entityId,
        seed: config.dataSeed,
        perturbation: config.perturbation,
        logger
      }),
      createSummaryExtractor({ source, entityId: config.entityId, seed: config.dataSeed, logger })
    ],
    transformers: defaultTransformers(),
    store,
    loader: createBatchLoader({ store, logger }),
    entityId: config.entityId,
    deltaMode: config.deltaMode,
    upsertMode: config.upsertMode,
    startDate: config.startDate,
    endDate: config.endDate,
    logger,
    clock: deps.clock
  });
}

export function exitCodeFor(result: PipelineRunResult): number {
  if (!result.success) {
    return EXIT_FAILED;
  }
  return result.recordsLoaded > 0 ? EXIT_LOADED : EXIT_NO_NEW_DATA;
}
