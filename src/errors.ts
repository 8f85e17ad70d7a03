/**
 * Error Handling
 *
 * Error classes raised by the explorer, plus helpers to turn any thrown
 * value into a readable message.
 *
 * @module errors
 */

import type { FailedGroup } from "./types.js";

export class ExplorerError extends Error {
  readonly code: string;
  /** True when the condition should be reported as "service unavailable" */
  readonly unavailable: boolean;

  constructor(code: string, message: string, options: { unavailable?: boolean; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.unavailable = options.unavailable ?? false;
  }
}

export class ClusterUnavailableError extends ExplorerError {
  constructor(message = "No Kubernetes connection") {
    super("CLUSTER_UNAVAILABLE", message, { unavailable: true });
  }
}

export class DiscoveryError extends ExplorerError {
  constructor(message: string, cause?: unknown) {
    super("DISCOVERY_FAILED", message, { unavailable: true, cause });
  }
}

/**
 * Response from the API server (or a transport failure talking to it).
 */
export class KubeApiError extends ExplorerError {
  /** HTTP status, undefined when no response was received */
  readonly status?: number;
  /** Kubernetes Status reason, e.g. "Forbidden", "NotFound", "Timeout" */
  readonly reason: string;

  constructor(message: string, status: number | undefined, reason: string) {
    super("KUBE_API_ERROR", message);
    this.status = status;
    this.reason = reason;
  }
}

export class CountError extends ExplorerError {
  readonly resource: string;
  readonly namespace: string;
  readonly status?: number;
  readonly reason?: string;
  /** Permission denial or non-listable resource; resolved silently */
  readonly expected: boolean;

  constructor(
    resource: string,
    namespace: string,
    cause: unknown,
    expected: boolean
  ) {
    super("COUNT_FAILED", `Failed to count ${resource} in ${namespace}: ${getErrorMessage(cause)}`, { cause });
    this.resource = resource;
    this.namespace = namespace;
    this.expected = expected;
    if (cause instanceof KubeApiError) {
      this.status = cause.status;
      this.reason = cause.reason;
    }
  }
}

export class ScanError extends ExplorerError {
  readonly namespace: string;

  constructor(namespace: string, cause: unknown) {
    super("SCAN_FAILED", `Failed to scan namespace ${namespace}: ${getErrorMessage(cause)}`, {
      unavailable: cause instanceof ExplorerError && cause.unavailable,
      cause,
    });
    this.namespace = namespace;
  }
}

export class ScanAbortedError extends ExplorerError {
  constructor(namespace: string) {
    super("SCAN_ABORTED", `Stopped waiting for namespace ${namespace}`);
  }
}

export class ResourceNotFoundError extends ExplorerError {
  constructor(identifier: string) {
    super("RESOURCE_NOT_FOUND", `resource ${identifier} not found or not namespaced`);
  }
}

/**
 * Some API groups failed discovery. Not thrown: carried on the catalog
 * snapshot and logged while the scan continues with the groups that answered.
 */
export class PartialDiscoveryWarning {
  readonly failedGroups: readonly FailedGroup[];
  readonly message: string;

  constructor(failedGroups: readonly FailedGroup[]) {
    this.failedGroups = failedGroups;
    this.message = `Some API groups failed discovery: ${failedGroups.length}`;
  }
}

/**
 * Kubernetes Status body returned with error responses
 */
interface StatusBody {
  message?: string;
  reason?: string;
}

function readStatusBody(data: unknown): StatusBody {
  if (!data || typeof data !== "object") return {};
  const body: StatusBody = {};
  if ("message" in data && typeof data.message === "string") body.message = data.message;
  if ("reason" in data && typeof data.reason === "string") body.reason = data.reason;
  return body;
}

/**
 * Build a KubeApiError from an HTTP status and the raw response body.
 */
export function kubeApiErrorFromResponse(status: number, statusText: string, data: unknown): KubeApiError {
  const body = readStatusBody(data);
  const reason = body.reason || statusText || `HTTP${status}`;
  return new KubeApiError(body.message || `${status} ${reason}`, status, reason);
}

/**
 * Extract error message from various error types
 */
export function getErrorMessage(error: unknown, fallback = "An error occurred"): string {
  if (!error) return fallback;

  if (error instanceof Error) {
    return error.message || fallback;
  }

  if (typeof error === "string") {
    return error;
  }

  const body = readStatusBody(error);
  if (body.message) {
    return body.message;
  }

  return fallback;
}

export function isUnavailable(error: unknown): boolean {
  return error instanceof ExplorerError && error.unavailable;
}
