/**
 * Telemetry
 *
 * One tracer and one set of metric instruments for the whole process.
 * Built once at startup and handed to the API; nothing here is created per request.
 *
 * Instruments:
 * - requests            counter, one per handled request, by route
 * - exceptions          counter, one per failed request, by route and error kind
 * - operation_duration  histogram (ms), by route
 */

import {
  createNoopMeter,
  metrics,
  trace,
  type Counter,
  type Histogram,
  type Meter,
  type Tracer,
} from "@opentelemetry/api";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import {
  BatchSpanProcessor,
  ConsoleSpanExporter,
  type SpanProcessor,
} from "@opentelemetry/sdk-trace-base";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import {
  ConsoleMetricExporter,
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricReader,
} from "@opentelemetry/sdk-metrics";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import type { TelemetryConfig } from "../config";

const INSTRUMENTATION_NAME = "course-portal";

// Export interval for pushed metrics
const METRIC_EXPORT_INTERVAL_MS = 15000;

export type ErrorKind = "course_not_found" | "missing_fields" | "store_failure";

export interface Telemetry {
  tracer: Tracer;
  meter: Meter;
  requestCounter: Counter;
  errorCounter: Counter;
  operationDuration: Histogram;
  shutdown(): Promise<void>;
}

export interface TelemetryOptions {
  serviceName: string;
  spanProcessors?: SpanProcessor[];
  metricReaders?: MetricReader[];
  // Install the providers as the process-wide OpenTelemetry globals
  register?: boolean;
}

function createInstruments(meter: Meter) {
  return {
    requestCounter: meter.createCounter("requests", {
      description: "number of requests",
    }),
    errorCounter: meter.createCounter("exceptions", {
      description: "number of exceptions caught",
    }),
    operationDuration: meter.createHistogram("operation_duration", {
      unit: "ms",
      description: "The duration of operations in milliseconds",
    }),
  };
}

/**
 * Build tracer and meter providers for the service and the instruments the API records to
 */
export function createTelemetry(options: TelemetryOptions): Telemetry {
  const resource = new Resource({ [ATTR_SERVICE_NAME]: options.serviceName });

  const tracerProvider = new NodeTracerProvider({ resource });
  for (const processor of options.spanProcessors || []) {
    tracerProvider.addSpanProcessor(processor);
  }

  const meterProvider = new MeterProvider({
    resource,
    readers: options.metricReaders || [],
  });

  if (options.register) {
    tracerProvider.register();
    metrics.setGlobalMeterProvider(meterProvider);
  }

  const meter = meterProvider.getMeter(INSTRUMENTATION_NAME);

  return {
    tracer: tracerProvider.getTracer(INSTRUMENTATION_NAME),
    meter,
    ...createInstruments(meter),
    async shutdown() {
      await Promise.all([tracerProvider.shutdown(), meterProvider.shutdown()]);
    },
  };
}

/**
 * Telemetry that records nothing, for when instrumentation is switched off
 */
export function createNoopTelemetry(): Telemetry {
  const meter = createNoopMeter();

  return {
    tracer: trace.getTracer(INSTRUMENTATION_NAME),
    meter,
    ...createInstruments(meter),
    async shutdown() {},
  };
}

/**
 * Build the process telemetry from configuration, with exporters chosen by config:
 * OTLP/HTTP when an endpoint is set, console when asked for, otherwise none.
 */
export function createTelemetryFromConfig(config: TelemetryConfig): Telemetry {
  if (!config.enabled) {
    return createNoopTelemetry();
  }

  const spanProcessors: SpanProcessor[] = [];
  const metricReaders: MetricReader[] = [];

  if (config.otlpEndpoint) {
    const base = config.otlpEndpoint.replace(/\/+$/, "");
    spanProcessors.push(new BatchSpanProcessor(new OTLPTraceExporter({ url: `${base}/v1/traces` })));
    metricReaders.push(
      new PeriodicExportingMetricReader({
        exporter: new OTLPMetricExporter({ url: `${base}/v1/metrics` }),
        exportIntervalMillis: METRIC_EXPORT_INTERVAL_MS,
      })
    );
  }

  if (config.consoleExporter) {
    spanProcessors.push(new BatchSpanProcessor(new ConsoleSpanExporter()));
    metricReaders.push(
      new PeriodicExportingMetricReader({
        exporter: new ConsoleMetricExporter(),
        exportIntervalMillis: METRIC_EXPORT_INTERVAL_MS,
      })
    );
  }

  return createTelemetry({
    serviceName: config.serviceName,
    spanProcessors,
    metricReaders,
    register: true,
  });
}
