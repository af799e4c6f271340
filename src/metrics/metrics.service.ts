import { Injectable } from '@nestjs/common';
import { Counter, Histogram, Registry } from 'prom-client';

/**
 * Service that registers and updates Prometheus metrics for pipeline runs.
 * Exposes rows per stage, drops per rule, run duration and failures.
 */
@Injectable()
export class MetricsService {
  private readonly register: Registry;

  /** Rows entering each stage */
  readonly stageRowsIn: Counter<string>;

  /** Rows leaving each stage */
  readonly stageRowsOut: Counter<string>;

  /** Rows removed, by stage and the rule responsible */
  readonly rowsDropped: Counter<string>;

  /** Rows received per source */
  readonly sourceRows: Counter<string>;

  /** Duration of a full pipeline run in seconds */
  readonly runDuration: Histogram<string>;

  /** Runs that ended in an exception */
  readonly runFailures: Counter<string>;

  constructor() {
    this.register = new Registry();
    this.stageRowsIn = new Counter({
      name: 'catalog_pipeline_stage_rows_in_total',
      help: 'Rows entering a pipeline stage',
      labelNames: ['stage'],
      registers: [this.register],
    });
    this.stageRowsOut = new Counter({
      name: 'catalog_pipeline_stage_rows_out_total',
      help: 'Rows leaving a pipeline stage',
      labelNames: ['stage'],
      registers: [this.register],
    });
    this.rowsDropped = new Counter({
      name: 'catalog_pipeline_rows_dropped_total',
      help: 'Rows dropped by a named rule',
      labelNames: ['stage', 'rule'],
      registers: [this.register],
    });
    this.sourceRows = new Counter({
      name: 'catalog_pipeline_source_rows_total',
      help: 'Rows received from a source',
      labelNames: ['source'],
      registers: [this.register],
    });
    this.runDuration = new Histogram({
      name: 'catalog_pipeline_run_duration_seconds',
      help: 'Pipeline run duration in seconds',
      buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30],
      registers: [this.register],
    });
    this.runFailures = new Counter({
      name: 'catalog_pipeline_run_failures_total',
      help: 'Pipeline runs that failed',
      labelNames: ['reason'],
      registers: [this.register],
    });
  }

  /**
   * Record the row counts of one stage.
   */
  recordStage(stage: string, rowsIn: number, rowsOut: number, drops: Record<string, number>): void {
    this.stageRowsIn.inc({ stage }, rowsIn);
    this.stageRowsOut.inc({ stage }, rowsOut);
    for (const [rule, count] of Object.entries(drops)) {
      if (count > 0) {
        this.rowsDropped.inc({ stage, rule }, count);
      }
    }
  }

  /**
   * Record how many rows a source delivered.
   */
  recordSource(source: string, rows: number): void {
    this.sourceRows.inc({ source }, rows);
  }

  /**
   * Record a completed run with its duration.
   */
  recordRun(durationSeconds: number): void {
    this.runDuration.observe(durationSeconds);
  }

  /**
   * Record a failed run.
   */
  recordFailure(reason: string): void {
    this.runFailures.inc({ reason }, 1);
  }

  /**
   * Get metrics in Prometheus text format.
   */
  async getMetrics(): Promise<string> {
    return this.register.metrics();
  }
}
