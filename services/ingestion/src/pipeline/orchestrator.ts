import { eachDate, toCalendarDate, type Logger, type StreamDefinition, type StreamName } from '@heartstore/shared';
import type { Extractor, ExtractedBatch } from '../extract/types';
import type { BatchLoader } from '../load/batchLoader';
import type { TableStore } from '../load/tableStore';
import { filterNew } from '../transform/deltaFilter';
import type { CanonicalRow } from '../transform/records';
import { transformBatch, type Transformer } from '../transform/transformers';
import { determineDateRange, type ResolvedDateRange, type StreamWatermark } from './dateRange';
import { PipelineError } from './errors';

export type PipelineState = 'idle' | 'preflight_checked' | 'range_determined' | 'running' | 'completed' | 'failed';

export type StateTransition = {
  from: PipelineState;
  to: PipelineState;
  at: string;
};

export type StageTimings = {
  preflightMs: number;
  rangeMs: number;
  extractMs: number;
  transformMs: number;
  loadMs: number;
  totalMs: number;
};

export type StreamRunStats = {
  extracted: number;
  valid: number;
  invalid: number;
  filtered: number;
  loaded: number;
};

export type PipelineRunResult = {
  state: 'completed' | 'failed';
  success: boolean;
  range: ResolvedDateRange | null;
  recordsProcessed: number;
  recordsLoaded: number;
  invalidRecords: number;
  missingValuesFilled: number;
  streams: Partial<Record<StreamName, StreamRunStats>>;
  timings: StageTimings;
  transitions: StateTransition[];
  error?: PipelineError;
};

export type PipelineOrchestratorOptions = {
  streams: readonly StreamDefinition[];
  extractors: readonly Extractor[];
  transformers: readonly Transformer[];
  store: TableStore;
  loader: BatchLoader;
  entityId: string;
  deltaMode: boolean;
  upsertMode: boolean;
  startDate?: string | null;
  endDate?: string | null;
  logger: Logger;
  clock?: { now(): Date };
};

export interface PipelineOrchestrator {
  run(): Promise<PipelineRunResult>;
}

const defaultClock = { now: () => new Date() };

function elapsed(startedAt: number): number {
  return Math.round((performance.now() - startedAt) * 100) / 100;
}

export function createPipelineOrchestrator(options: PipelineOrchestratorOptions): PipelineOrchestrator {
  const { store, loader, entityId } = options;
  const clock = options.clock ?? defaultClock;
  const logger = options.logger.child({ component: 'pipeline', entityId });
  const streamsByName = new Map(options.streams.map((stream) => [stream.name, stream]));
  const transformersByStream = new Map(options.transformers.map((transformer) => [transformer.stream, transformer]));

  async function run(): Promise<PipelineRunResult> {
    const runStartedAt = performance.now();
    let state: PipelineState = 'idle';
    const transitions: StateTransition[] = [];
    const timings: StageTimings = { preflightMs: 0, rangeMs: 0, extractMs: 0, transformMs: 0, loadMs: 0, totalMs: 0 };
    const streamStats: Partial<Record<StreamName, StreamRunStats>> = {};
    let range: ResolvedDateRange | null = null;
    let recordsProcessed = 0;
    let recordsLoaded = 0;
    let invalidRecords = 0;
    let missingValuesFilled = 0;
    let batchesExtracted = 0;

    function transition(to: PipelineState): void {
      transitions.push({ from: state, to, at: clock.now().toISOString() });
      logger.debug({ from: state, to }, 'pipeline state changed');
      state = to;
    }

    function statsFor(stream: StreamName): StreamRunStats {
      const existing = streamStats[stream];
      if (existing) {
        return existing;
      }
      const created: StreamRunStats = { extracted: 0, valid: 0, invalid: 0, filtered: 0, loaded: 0 };
      streamStats[stream] = created;
      return created;
    }

    function finish(error?: PipelineError): PipelineRunResult {
      transition(error ? 'failed' : 'completed');
      timings.totalMs = elapsed(runStartedAt);
      const result: PipelineRunResult = {
        state: error ? 'failed' : 'completed',
        success: !error,
        range,
        recordsProcessed,
        recordsLoaded,
        invalidRecords,
        missingValuesFilled,
        streams: streamStats,
        timings,
        transitions
      };
      if (error) {
        result.error = error;
        logger.error({ err: error, stage: error.stage, timings }, 'pipeline run failed');
      } else {
        logger.info(
          { range, recordsProcessed, recordsLoaded, invalidRecords, missingValuesFilled, timings },
          recordsLoaded > 0 ? 'pipeline run completed' : 'pipeline run completed with no new data'
        );
      }
      return result;
    }

    // Preflight: every registered stream must be reachable and schema-ready.
    let stageStartedAt = performance.now();
    for (const stream of options.streams) {
      try {
        await store.checkReady(stream);
      } catch (err) {
        timings.preflightMs = elapsed(stageStartedAt);
        return finish(new PipelineError('preflight', `Store not ready for ${stream.name}`, { cause: err }));
      }
    }
    timings.preflightMs = elapsed(stageStartedAt);
    transition('preflight_checked');

    stageStartedAt = performance.now();
    const watermarks = new Map<StreamName, Date | null>();
    try {
      const readings: StreamWatermark[] = [];
      for (const stream of options.streams) {
        const watermark = await store.readWatermark(stream, entityId);
        watermarks.set(stream.name, watermark);
        readings.push({ stream: stream.name, watermark });
        logger.info({ stream: stream.name, watermark: watermark?.toISOString() ?? null }, 'read stream watermark');
      }
      range = determineDateRange({
        watermarks: readings,
        today: toCalendarDate(clock.now()),
        startDate: options.startDate,
        endDate: options.endDate
      });
    } catch (err) {
      timings.rangeMs = elapsed(stageStartedAt);
      return finish(new PipelineError('range', 'Failed to determine the date range', { cause: err }));
    }
    timings.rangeMs = elapsed(stageStartedAt);
    transition('range_determined');
    logger.info({ range }, 'processing date range');

    transition('running');
    for (const date of eachDate(range.start, range.end)) {
      stageStartedAt = performance.now();
      const extracted: ExtractedBatch[] = [];
      for (const extractor of options.extractors) {
        extracted.push(...(await extractor.extract(date)));
      }
      timings.extractMs += elapsed(stageStartedAt);
      batchesExtracted += extracted.length;

      // Every batch of the date is transformed before any of them is loaded.
      const pending: Array<{ stream: StreamDefinition; rows: CanonicalRow[] }> = [];
      stageStartedAt = performance.now();
      for (const batch of extracted) {
        const stream = streamsByName.get(batch.stream);
        const transformer = transformersByStream.get(batch.stream);
        if (!stream || !transformer) {
          logger.warn({ stream: batch.stream, date }, 'no transformer registered for stream; skipping');
          continue;
        }
        const stats = statsFor(stream.name);
        stats.extracted += batch.records.length;
        recordsProcessed += batch.records.length;

        const transformed = transformBatch(transformer, batch.records);
        const rows = options.deltaMode
          ? filterNew(transformed.rows, watermarks.get(stream.name) ?? null, stream.timestampColumn)
          : transformed.rows;

        stats.valid += transformed.stats.valid;
        stats.invalid += transformed.stats.invalid;
        stats.filtered += transformed.rows.length - rows.length;
        invalidRecords += transformed.stats.invalid;
        missingValuesFilled += transformed.stats.missingValuesFilled;

        if (rows.length === 0) {
          logger.info({ stream: stream.name, date }, 'no new records after delta check');
          continue;
        }
        pending.push({ stream, rows });
      }
      timings.transformMs += elapsed(stageStartedAt);

      for (const { stream, rows } of pending) {
        stageStartedAt = performance.now();
        const loaded = await loader.load(stream, rows, { upsert: options.upsertMode });
        if (!loaded.success) {
          timings.loadMs += elapsed(stageStartedAt);
          return finish(
            new PipelineError('load', `Loading failed for ${stream.name} on ${date}`, { cause: loaded.error })
          );
        }
        const stats = statsFor(stream.name);
        stats.loaded += loaded.committed;
        recordsLoaded += loaded.committed;

        if (!(await loader.verify(stream, entityId, loaded.attempted))) {
          logger.warn({ stream: stream.name, date }, 'loading verification failed');
        }
        timings.loadMs += elapsed(stageStartedAt);
      }
    }

    if (batchesExtracted === 0) {
      return finish(new PipelineError('extract', `No data retrieved for ${range.start}..${range.end}`));
    }

    return finish();
  }

  return { run };
}
