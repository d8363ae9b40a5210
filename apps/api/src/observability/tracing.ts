import { diag, DiagConsoleLogger, DiagLogLevel, trace, type Attributes, type Span } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { isTestRuntime } from "../runtime-safety";

const UNTRACED_PATHS = new Set(["/health", "/ready", "/metrics"]);

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  ALL: DiagLogLevel.ALL,
  VERBOSE: DiagLogLevel.VERBOSE,
  DEBUG: DiagLogLevel.DEBUG,
  INFO: DiagLogLevel.INFO,
  WARN: DiagLogLevel.WARN,
  ERROR: DiagLogLevel.ERROR,
  NONE: DiagLogLevel.NONE,
};

export const REGISTRY_SPAN_ATTRIBUTES = {
  operation: "registry.operation",
  table: "registry.table",
  recordId: "registry.record_id",
  actorRole: "registry.actor_role",
} as const;

let sdk: NodeSDK | null = null;

export function registrySpanAttributes(entry: {
  operation: string;
  table: string;
  recordId: string | null;
  actorRole?: string;
}): Attributes {
  const attributes: Attributes = {
    [REGISTRY_SPAN_ATTRIBUTES.operation]: entry.operation,
    [REGISTRY_SPAN_ATTRIBUTES.table]: entry.table,
  };
  if (entry.recordId !== null) attributes[REGISTRY_SPAN_ATTRIBUTES.recordId] = entry.recordId;
  if (entry.actorRole) attributes[REGISTRY_SPAN_ATTRIBUTES.actorRole] = entry.actorRole;
  return attributes;
}

/**
 * Tag the current request span with the registry mutation it performed.
 * A no-op when tracing is off.
 */
export function annotateRegistrySpan(
  entry: Parameters<typeof registrySpanAttributes>[0],
  span: Pick<Span, "setAttributes"> | undefined = trace.getActiveSpan()
): void {
  span?.setAttributes(registrySpanAttributes(entry));
}

export function tracingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.OTEL_ENABLED === "false") return false;
  if (env.OTEL_ENABLED === "true") return true;
  return !isTestRuntime();
}

function traceEndpoint(env: NodeJS.ProcessEnv): string | undefined {
  const endpoint = (env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || env.OTEL_EXPORTER_OTLP_ENDPOINT || "").trim();
  return endpoint.length > 0 ? endpoint : undefined;
}

export function startTracing(env: NodeJS.ProcessEnv = process.env): void {
  if (sdk || !tracingEnabled(env)) return;

  const diagLevel = DIAG_LEVELS[(env.OTEL_DIAG_LOG_LEVEL || "").trim().toUpperCase()];
  if (diagLevel !== undefined) diag.setLogger(new DiagConsoleLogger(), diagLevel);

  const endpoint = traceEndpoint(env);
  try {
    const started = new NodeSDK({
      serviceName: env.OTEL_SERVICE_NAME || "civic-registry-api",
      traceExporter: endpoint ? new OTLPTraceExporter({ url: endpoint }) : undefined,
      instrumentations: [
        new FastifyInstrumentation({
          requestHook: (span, info) => {
            const requestId = String(info.request.id || "").trim();
            if (requestId) span.setAttribute("request.id", requestId);
          },
        }),
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
          "@opentelemetry/instrumentation-http": {
            ignoreIncomingRequestHook: (request) => UNTRACED_PATHS.has((request.url || "").split("?")[0]),
          },
          "@opentelemetry/instrumentation-fastify": { enabled: false },
          // Statement text may carry national IDs and account numbers.
          "@opentelemetry/instrumentation-pg": { enhancedDatabaseReporting: false },
        }),
      ],
    });
    started.start();
    sdk = started;
  } catch (error) {
    // eslint-disable-next-line no-console
    console.error("Failed to initialize OpenTelemetry tracing", error);
  }
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk) return;
  const running = sdk;
  sdk = null;
  await running.shutdown();
}
