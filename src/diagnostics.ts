/**
 * Azure DevOps Access — Diagnostics
 *
 * Event emitter for REST call tracing.
 */

import { createLogger } from "./logging/index.js";
import { getErrorStatusCode } from "./retry.js";

// =============================================================================
// Types
// =============================================================================

export type DevOpsDiagnosticEventType = "devops.api.call" | "devops.api.error";

export type DevOpsDiagnosticEvent = {
  type: DevOpsDiagnosticEventType;
  timestamp: number;
  seq: number;
  service: string;
  operation: string;
  organization?: string;
  durationMs?: number;
  statusCode?: number;
  error?: string;
  metadata?: Record<string, unknown>;
};

export type DevOpsDiagnosticListener = (event: DevOpsDiagnosticEvent) => void;

// =============================================================================
// Global State
// =============================================================================

let diagnosticsEnabled = false;
let seq = 0;
const listeners = new Set<DevOpsDiagnosticListener>();
const log = createLogger("diagnostics");

// =============================================================================
// Public API
// =============================================================================

export function enableDevOpsDiagnostics(): void {
  diagnosticsEnabled = true;
}

export function disableDevOpsDiagnostics(): void {
  diagnosticsEnabled = false;
}

export function isDevOpsDiagnosticsEnabled(): boolean {
  return diagnosticsEnabled;
}

/** Subscribe to diagnostic events. Returns an unsubscribe function. */
export function onDevOpsDiagnosticEvent(listener: DevOpsDiagnosticListener): () => void {
  listeners.add(listener);
  return () => {
    listeners.delete(listener);
  };
}

export function emitDevOpsDiagnosticEvent(event: Omit<DevOpsDiagnosticEvent, "timestamp" | "seq">): void {
  if (!diagnosticsEnabled) return;

  const fullEvent: DevOpsDiagnosticEvent = {
    ...event,
    timestamp: Date.now(),
    seq: ++seq,
  };

  for (const listener of listeners) {
    try {
      listener(fullEvent);
    } catch (error) {
      // A failing listener must not fail the API call it observes.
      log.warn("diagnostic listener failed", {
        operation: fullEvent.operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Wrap a REST call with diagnostic instrumentation.
 */
export async function instrumentedDevOpsCall<T>(
  service: string,
  operation: string,
  fn: () => Promise<T>,
  options?: { organization?: string; metadata?: Record<string, unknown> },
): Promise<T> {
  if (!diagnosticsEnabled) return fn();

  const start = Date.now();

  try {
    const result = await fn();

    emitDevOpsDiagnosticEvent({
      type: "devops.api.call",
      service,
      operation,
      durationMs: Date.now() - start,
      organization: options?.organization,
      metadata: options?.metadata,
    });

    return result;
  } catch (error) {
    emitDevOpsDiagnosticEvent({
      type: "devops.api.error",
      service,
      operation,
      durationMs: Date.now() - start,
      statusCode: getErrorStatusCode(error),
      error: error instanceof Error ? error.message : String(error),
      organization: options?.organization,
      metadata: options?.metadata,
    });

    throw error;
  }
}

/**
 * Reset diagnostics state for tests.
 */
export function resetDevOpsDiagnosticsForTest(): void {
  diagnosticsEnabled = false;
  seq = 0;
  listeners.clear();
}
