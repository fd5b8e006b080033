// ──────────────────────────────────────────
// Analytics: Facade — scope → signature → cache → engine
// ──────────────────────────────────────────

import {
  CustomerResult,
  Interval,
  OverviewResult,
  ProductResult,
  TimeSeriesResult,
} from '../../shared/types';
import {
  customerResultSchema,
  overviewResultSchema,
  productResultSchema,
  timeSeriesResultSchema,
} from '../../shared/schemas';
import { AggregationEngine } from './aggregation.engine';
import { QueryCache } from './cache/query-cache';
import { analysisSignature } from './cache/signature';
import { DateInput, parseInterval, resolveScope } from './scope';

export class AnalyticsFacade {
  constructor(
    private engine: AggregationEngine,
    private cache: QueryCache
  ) {}

  async timeSeries(start?: DateInput, end?: DateInput, interval: Interval = 'day'): Promise<TimeSeriesResult> {
    const scope = resolveScope(start, end);
    const resolved = parseInterval(interval);
    return this.cache.getOrCompute(
      analysisSignature('time_series', scope, resolved),
      timeSeriesResultSchema,
      () => this.engine.timeSeries(scope, resolved)
    );
  }

  async productAnalysis(start?: DateInput, end?: DateInput): Promise<ProductResult> {
    const scope = resolveScope(start, end);
    return this.cache.getOrCompute(
      analysisSignature('product', scope),
      productResultSchema,
      () => this.engine.productAnalysis(scope)
    );
  }

  async customerAnalysis(start?: DateInput, end?: DateInput): Promise<CustomerResult> {
    const scope = resolveScope(start, end);
    return this.cache.getOrCompute(
      analysisSignature('customer', scope),
      customerResultSchema,
      () => this.engine.customerAnalysis(scope)
    );
  }

  async salesOverview(start?: DateInput, end?: DateInput): Promise<OverviewResult> {
    const scope = resolveScope(start, end);
    return this.cache.getOrCompute(
      analysisSignature('overview', scope),
      overviewResultSchema,
      () => this.engine.overview(scope)
    );
  }
}
