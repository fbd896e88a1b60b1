import type { FastifyBaseLogger, FastifyServerOptions } from "fastify";

/**
 * Where domain objects report non-fatal conditions
 */
export interface DiagnosticsSink {
  warn(fields: Record<string, unknown>, message: string): void;
}

export const silentDiagnostics: DiagnosticsSink = {
  warn: () => undefined,
};

/**
 * Logger settings for the Fastify instance, which logs through pino
 */
export function loggerOptions(): FastifyServerOptions["logger"] {
  return { level: process.env.LOG_LEVEL ?? "info" };
}

/**
 * Adapt a Fastify logger (usually a child) into a diagnostics sink
 */
export function diagnosticsFrom(log: FastifyBaseLogger): DiagnosticsSink {
  return {
    warn: (fields, message) => log.warn(fields, message),
  };
}
