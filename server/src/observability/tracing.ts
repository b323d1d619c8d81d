/**
 * tracing.ts
 *
 * OpenTelemetry SDK for tracing and metrics with OTLP HTTP exporters and the
 * Node auto-instrumentations. Loaded only when `OTEL_ENABLED` is set, so a
 * plain local run carries none of it.
 */

import {NodeSDK} from '@opentelemetry/sdk-node';
import {getNodeAutoInstrumentations} from '@opentelemetry/auto-instrumentations-node';
import {OTLPTraceExporter} from '@opentelemetry/exporter-trace-otlp-http';
import {PeriodicExportingMetricReader} from '@opentelemetry/sdk-metrics';
import {OTLPMetricExporter} from '@opentelemetry/exporter-metrics-otlp-http';

export function startTelemetry(): NodeSDK {
    const sdk = new NodeSDK({
        traceExporter: new OTLPTraceExporter({
            url: process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT ?? 'http://localhost:4318/v1/traces',
        }),
        metricReader: new PeriodicExportingMetricReader({
            exporter: new OTLPMetricExporter({
                url: process.env.OTEL_EXPORTER_OTLP_METRICS_ENDPOINT ?? 'http://localhost:4318/v1/metrics',
            }),
            exportIntervalMillis: 10000,
        }),
        instrumentations: [getNodeAutoInstrumentations()],
    });
    sdk.start();
    return sdk;
}
