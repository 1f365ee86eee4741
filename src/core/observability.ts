import { now } from "../types/index.js";

/** Ordered from least to most severe. */
export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function severity(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export interface LogEntry {
  runId?: string;
  timestamp: number;
  level: LogLevel;
  component: string;
  message: string;
  data?: unknown;
}

export type LogSink = (entry: LogEntry) => void;

// Error fields are not enumerable; spell them out so they survive JSON.
function jsonValue(_key: string, value: unknown): unknown {
  if (value instanceof Error) return { name: value.name, message: value.message };
  return value;
}

/** One JSON object per line on stderr; stdout carries the run's result. */
export const stderrSink: LogSink = (entry) => {
  process.stderr.write(JSON.stringify(entry, jsonValue) + "\n");
};

export interface LoggerOptions {
  minLevel?: LogLevel;
  sink?: LogSink;
  runId?: string;
}

export class Logger {
  private readonly threshold: number;
  private readonly sink: LogSink;
  private readonly runId: string | undefined;

  constructor(
    private readonly component: string,
    options: LoggerOptions = {},
  ) {
    this.threshold = severity(options.minLevel ?? "debug");
    this.sink = options.sink ?? stderrSink;
    this.runId = options.runId;
  }

  debug(message: string, data?: unknown): void {
    this.write("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.write("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.write("warn", message, data);
  }

  error(message: string, data?: unknown): void {
    this.write("error", message, data);
  }

  fatal(message: string, data?: unknown): void {
    this.write("fatal", message, data);
  }

  private write(level: LogLevel, message: string, data: unknown): void {
    if (severity(level) < this.threshold) return;
    this.sink({
      ...(this.runId !== undefined ? { runId: this.runId } : {}),
      timestamp: now(),
      level,
      component: this.component,
      message,
      ...(data !== undefined ? { data } : {}),
    });
  }
}

export type MetricType = "counter" | "gauge";

export interface MetricEntry {
  name: string;
  type: MetricType;
  value: number;
  labels?: Record<string, string>;
  timestamp: number;
}

type Labels = Record<string, string> | undefined;

/** `name{a=1,b=2}` with labels sorted, so label order never splits a series. */
function seriesKey(name: string, labels: Labels): string {
  if (!labels) return name;
  const pairs = Object.entries(labels)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${v}`);
  return pairs.length === 0 ? name : `${name}{${pairs.join(",")}}`;
}

/**
 * In-process run metrics: counters for pass outcomes and commits, gauges for
 * the latest probed coverage and failure counts.
 */
export class MetricsCollector {
  private readonly series = new Map<string, MetricEntry>();

  counter(name: string, value: number = 1, labels?: Record<string, string>): void {
    const previous = this.series.get(seriesKey(name, labels));
    this.set("counter", name, (previous?.type === "counter" ? previous.value : 0) + value, labels);
  }

  gauge(name: string, value: number, labels?: Record<string, string>): void {
    this.set("gauge", name, value, labels);
  }

  /** Current value of a series; 0 when never written. */
  value(name: string, labels?: Record<string, string>): number {
    return this.series.get(seriesKey(name, labels))?.value ?? 0;
  }

  getMetrics(): MetricEntry[] {
    return Array.from(this.series.values(), (entry) => ({
      ...entry,
      ...(entry.labels ? { labels: { ...entry.labels } } : {}),
    }));
  }

  private set(type: MetricType, name: string, value: number, labels: Labels): void {
    this.series.set(seriesKey(name, labels), {
      name,
      type,
      value,
      ...(labels ? { labels: { ...labels } } : {}),
      timestamp: now(),
    });
  }
}

/** Shares one sink, level and metrics collector across a run's loggers. */
export class ObservabilityProvider {
  private readonly metrics = new MetricsCollector();

  constructor(
    private readonly minLevel: LogLevel = "debug",
    private readonly sink: LogSink = stderrSink,
  ) {}

  createLogger(component: string, runId?: string): Logger {
    return new Logger(component, {
      minLevel: this.minLevel,
      sink: this.sink,
      ...(runId !== undefined ? { runId } : {}),
    });
  }

  getMetrics(): MetricsCollector {
    return this.metrics;
  }
}
