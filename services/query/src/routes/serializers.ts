import type { EntitySeries } from '../query/fanoutExecutor';
import type { EntitySummary, SeriesPoint } from '../query/seriesReader';
import type { QueryInfo } from '../services/timeseriesService';

export function serializePoint(point: SeriesPoint) {
  return {
    timestamp: point.timestamp.toISOString(),
    value: point.value,
    user_id: point.entityId
  };
}

export function serializeEntitySeries(series: EntitySeries) {
  return {
    user_id: series.entityId,
    data: series.data.map(serializePoint),
    count: series.count
  };
}

export function serializeQueryInfo(info: QueryInfo) {
  return {
    table_used: info.tableUsed,
    table_description: info.tableDescription,
    interval: info.interval
  };
}

export function serializeEntitySummary(summary: EntitySummary) {
  return {
    user_id: summary.entityId,
    record_count: summary.recordCount,
    first_record: summary.firstRecord ? summary.firstRecord.toISOString() : null,
    last_record: summary.lastRecord ? summary.lastRecord.toISOString() : null
  };
}
