import { createServer } from 'http';
import type { OutputPumpMetrics } from '@gridrelay/render';
import * as Sentry from '@sentry/node';

interface StatsServerConfig {
  port: number;
  getSessionCount: () => number;
  getTransportMetrics: () => OutputPumpMetrics[];
  startTime: Date;
}

/**
 * The parts of an HTTP request and response the handler touches
 */
export interface StatsRequest {
  method?: string;
  url?: string;
}

export interface StatsResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

export interface RelayStats {
  server: {
    uptime_seconds: number;
    started_at: string;
    active_sessions: number;
    node_version: string;
    pid: number;
    memory: {
      rss_mb: number;
      heap_used_mb: number;
    };
  };
  transport: {
    total_sessions: number;
    total_queued_bytes: number;
    peak_queued_bytes: number;
    total_dropped_chunks: number;
    total_overflows: number;
    total_drain_events: number;
    total_bytes_written: number;
  };
}

/**
 * Sum per-session pump metrics
 */
export function aggregateTransport(metrics: OutputPumpMetrics[]): RelayStats['transport'] {
  return {
    total_sessions: metrics.length,
    total_queued_bytes: metrics.reduce((sum, m) => sum + m.queuedBytes, 0),
    peak_queued_bytes: metrics.reduce((peak, m) => Math.max(peak, m.peakQueuedBytes), 0),
    total_dropped_chunks: metrics.reduce((sum, m) => sum + m.droppedChunks, 0),
    total_overflows: metrics.reduce((sum, m) => sum + m.overflowCount, 0),
    total_drain_events: metrics.reduce((sum, m) => sum + m.drainCount, 0),
    total_bytes_written: metrics.reduce((sum, m) => sum + m.totalBytesWritten, 0),
  };
}

export class StatsServer {
  private server: ReturnType<typeof createServer>;
  private config: StatsServerConfig;

  constructor(config: StatsServerConfig) {
    this.config = config;
    this.server = createServer(this.handleRequest.bind(this));
  }

  start(): void {
    this.server.listen(this.config.port, '0.0.0.0', () => {
      console.log(`[stats] listening on http://0.0.0.0:${this.config.port}/stats`);
    });
  }

  stop(): void {
    this.server.close();
  }

  getStats(now: Date = new Date()): RelayStats {
    const mem = process.memoryUsage();
    return {
      server: {
        uptime_seconds: Math.floor((now.getTime() - this.config.startTime.getTime()) / 1000),
        started_at: this.config.startTime.toISOString(),
        active_sessions: this.config.getSessionCount(),
        node_version: process.version,
        pid: process.pid,
        memory: {
          rss_mb: Math.round(mem.rss / 1024 / 1024),
          heap_used_mb: Math.round(mem.heapUsed / 1024 / 1024),
        },
      },
      transport: aggregateTransport(this.config.getTransportMetrics()),
    };
  }

  handleRequest(req: StatsRequest, res: StatsResponse): void {
    if (req.method !== 'GET' || req.url !== '/stats') {
      res.writeHead(404, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Not found' }));
      return;
    }

    let body: string;
    try {
      body = JSON.stringify(this.getStats(), null, 2);
    } catch (error) {
      console.error('[stats] failed to build stats:', error);
      Sentry.captureException(error);
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'Internal error' }));
      return;
    }

    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(body);
  }
}
