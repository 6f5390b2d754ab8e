import { Injectable } from '@nestjs/common';
import {
  Counter,
  Gauge,
  Histogram,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

@Injectable()
export class MetricsService {
  // One registry per instance, so test modules can build the service twice.
  public readonly registry = new Registry();

  private readonly httpRequestDuration: Histogram<string>;
  private readonly httpRequestTotal: Counter<string>;
  private readonly httpRequestErrors: Counter<string>;
  private readonly taskCreated: Counter<string>;
  private readonly taskCompleted: Counter<string>;
  private readonly taskFailed: Counter<string>;
  private readonly taskProcessingDuration: Histogram<string>;
  private readonly taskStatus: Counter<string>;
  private readonly taskQueueSize: Gauge<string>;
  private readonly taskQueueWaitTime: Histogram<string>;
  private readonly translationTokens: Counter<string>;
  private readonly taskEventsDropped: Counter<string>;
  private readonly taskStreamObservers: Gauge<string>;
  private readonly dbQueryDuration: Histogram<string>;
  private readonly dbQueryTotal: Counter<string>;
  private readonly dbQueryErrors: Counter<string>;

  constructor() {
    // Collect default metrics (CPU, memory, etc.)
    collectDefaultMetrics({ register: this.registry });

    this.httpRequestDuration = new Histogram({
      name: 'http_request_duration_seconds',
      help: 'Duration of HTTP requests in seconds',
      labelNames: ['method', 'route', 'status'],
      buckets: [0.1, 0.3, 0.5, 0.7, 1, 3, 5, 7, 10],
      registers: [this.registry],
    });

    this.httpRequestTotal = new Counter({
      name: 'http_requests_total',
      help: 'Total number of HTTP requests',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.httpRequestErrors = new Counter({
      name: 'http_request_errors_total',
      help: 'Total number of HTTP request errors',
      labelNames: ['method', 'route', 'status'],
      registers: [this.registry],
    });

    this.taskCreated = new Counter({
      name: 'tasks_created_total',
      help: 'Total number of translation tasks created',
      registers: [this.registry],
    });

    this.taskCompleted = new Counter({
      name: 'tasks_completed_total',
      help: 'Total number of translation tasks completed successfully',
      registers: [this.registry],
    });

    this.taskFailed = new Counter({
      name: 'tasks_failed_total',
      help: 'Total number of translation tasks that failed',
      registers: [this.registry],
    });

    // Admission to terminal state
    this.taskProcessingDuration = new Histogram({
      name: 'task_processing_duration_seconds',
      help: 'Duration of task processing in seconds',
      labelNames: ['status'],
      buckets: [1, 5, 10, 30, 60, 120, 300, 600, 1800, 3600],
      registers: [this.registry],
    });

    this.taskStatus = new Counter({
      name: 'tasks_status_total',
      help: 'Total number of task status transitions by target status',
      labelNames: ['status'],
      registers: [this.registry],
    });

    this.taskQueueSize = new Gauge({
      name: 'task_queue_size',
      help: 'Tasks waiting for or holding an execution slot',
      labelNames: ['state'],
      registers: [this.registry],
    });

    this.taskQueueWaitTime = new Histogram({
      name: 'task_queue_wait_time_seconds',
      help: 'Time a task spent waiting in queue before processing',
      buckets: [0.1, 0.5, 1, 5, 10, 30, 60, 300, 900],
      registers: [this.registry],
    });

    this.translationTokens = new Counter({
      name: 'translation_tokens_total',
      help: 'Token usage reported by the translation engine',
      labelNames: ['kind'],
      registers: [this.registry],
    });

    this.taskEventsDropped = new Counter({
      name: 'task_events_dropped_total',
      help: 'Task events not delivered to an observer whose buffer was full',
      labelNames: ['event_type'],
      registers: [this.registry],
    });

    this.taskStreamObservers = new Gauge({
      name: 'task_stream_observers',
      help: 'Currently attached task stream observers',
      registers: [this.registry],
    });

    this.dbQueryDuration = new Histogram({
      name: 'db_query_duration_seconds',
      help: 'Duration of database queries in seconds',
      labelNames: ['operation', 'entity'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1, 2, 5],
      registers: [this.registry],
    });

    this.dbQueryTotal = new Counter({
      name: 'db_queries_total',
      help: 'Total number of database queries',
      labelNames: ['operation', 'entity'],
      registers: [this.registry],
    });

    this.dbQueryErrors = new Counter({
      name: 'db_query_errors_total',
      help: 'Total number of database query errors',
      labelNames: ['operation', 'entity', 'error_type'],
      registers: [this.registry],
    });
  }

  /**
   * Record HTTP request metrics
   */
  recordHttpRequest(
    method: string,
    route: string,
    statusCode: number,
    duration: number,
  ): void {
    const labels = {
      method,
      route,
      status: statusCode.toString(),
    };

    this.httpRequestDuration.observe(labels, duration);
    this.httpRequestTotal.inc(labels);

    if (statusCode >= 400) {
      this.httpRequestErrors.inc(labels);
    }
  }

  recordTaskCreated(): void {
    this.taskCreated.inc();
    this.taskStatus.inc({ status: 'queued' });
  }

  recordTaskCompleted(duration: number): void {
    this.taskCompleted.inc();
    this.taskStatus.inc({ status: 'completed' });
    this.taskProcessingDuration.observe({ status: 'completed' }, duration);
  }

  recordTaskFailed(duration: number): void {
    this.taskFailed.inc();
    this.taskStatus.inc({ status: 'failed' });
    this.taskProcessingDuration.observe({ status: 'failed' }, duration);
  }

  recordTaskStatusChange(status: string): void {
    this.taskStatus.inc({ status: status.toLowerCase() });
  }

  setTaskQueueSize(pending: number, active: number): void {
    this.taskQueueSize.set({ state: 'pending' }, pending);
    this.taskQueueSize.set({ state: 'active' }, active);
  }

  recordTaskQueueWaitTime(waitTime: number): void {
    this.taskQueueWaitTime.observe(waitTime);
  }

  /**
   * Record engine token usage, one counter per reported kind
   */
  recordTokenUsage(usage: Record<string, number>): void {
    for (const [kind, count] of Object.entries(usage)) {
      if (Number.isFinite(count) && count > 0) {
        this.translationTokens.inc({ kind }, count);
      }
    }
  }

  recordTaskEventsDropped(eventType: string, count: number): void {
    this.taskEventsDropped.inc({ event_type: eventType }, count);
  }

  recordStreamAttached(): void {
    this.taskStreamObservers.inc();
  }

  recordStreamDetached(): void {
    this.taskStreamObservers.dec();
  }

  /**
   * Record database query metrics
   */
  recordDbQuery(operation: string, entity: string, duration: number): void {
    const labels = { operation, entity };
    this.dbQueryTotal.inc(labels);
    this.dbQueryDuration.observe(labels, duration);
  }

  /**
   * Record database query error
   */
  recordDbQueryError(
    operation: string,
    entity: string,
    errorType: string,
  ): void {
    this.dbQueryErrors.inc({ operation, entity, error_type: errorType });
  }

  /**
   * Get metrics in Prometheus format
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  public get contentType(): string {
    return this.registry.contentType;
  }
}
