/**
 * Namespace Scan Tool
 *
 * Lists a namespace's resource types while relaying scan progress to the
 * caller, for clients that asked for progress notifications.
 */
import { ExplorerError } from "../errors.js";
import type { ResourceExplorer } from "../explorer.js";
import { describeProgress, type ProgressEvent } from "../discovery/progress.js";
import { formatNamespaceResources } from "../formatters.js";
import type { ResourceFilters } from "../types.js";

export type ProgressSink = (event: ProgressEvent, message: string) => Promise<void>;

/**
 * Relay progress events, then read the (now cached) result.
 *
 * @returns Formatted resource table
 */
export async function scanNamespace(
  explorer: ResourceExplorer,
  namespace: string,
  filters: ResourceFilters,
  sink: ProgressSink,
  signal?: AbortSignal
): Promise<string> {
  let failure: Extract<ProgressEvent, { type: "error" }> | undefined;

  for await (const event of explorer.streamProgress(namespace, signal)) {
    if (event.type === "error") failure = event;
    await sink(event, describeProgress(event));
  }

  if (failure) {
    throw new ExplorerError("SCAN_FAILED", failure.message, { unavailable: failure.unavailable });
  }

  const result = await explorer.getNamespaceResources(namespace, filters, { signal });
  return formatNamespaceResources(result, filters);
}
