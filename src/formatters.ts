/**
 * Data Formatters
 *
 * Format explorer results into markdown for MCP clients.
 */
import { formatDuration } from "./logger.js";
import type {
  CacheStatus,
  CountedResourceType,
  KubeObject,
  NamespaceResources,
  ObjectDetail,
  ObjectSummary,
  ResourceFilters,
} from "./types.js";

function groupLabel(apiGroup: string): string {
  return apiGroup || "core";
}

function formatLabels(labels: Record<string, string>): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) return "-";
  return entries.map(([key, value]) => `${key}=${value}`).join(", ");
}

/**
 * Format namespace list
 */
export function formatNamespaces(namespaces: string[]): string {
  if (namespaces.length === 0) {
    return "No namespaces found.";
  }

  const lines: string[] = [`# Namespaces (${namespaces.length} total)\n`];
  for (const namespace of namespaces) {
    lines.push(`- ${namespace}`);
  }
  return lines.join("\n");
}

function describeFilters(filters: ResourceFilters): string {
  const parts: string[] = [];
  if (filters.search) parts.push(`search "${filters.search}"`);
  if (filters.populatedOnly) parts.push("populated only");
  if (filters.apiGroup) parts.push(`API group ${filters.apiGroup}`);
  return parts.join(", ");
}

/**
 * Format resource types with counts for one namespace
 */
export function formatNamespaceResources(result: NamespaceResources, filters: ResourceFilters = {}): string {
  const lines: string[] = [
    `# Resources in ${result.namespace}\n`,
    `- **Resource types:** ${result.count} shown of ${result.totalDiscovered} discovered`,
    `- **Total objects:** ${result.totalObjects}`,
    `- **Cache:** ${
      result.cache.hit
        ? `hit (cached ${formatDuration(result.cache.ageMs)} ago)`
        : "fresh data - object counts calculated"
    }`,
  ];
  const filterText = describeFilters(filters);
  if (filterText) {
    lines.push(`- **Filters:** ${filterText}`);
  }
  lines.push("");

  if (result.resources.length === 0) {
    lines.push("No resource types match.");
    return lines.join("\n");
  }

  lines.push("| Resource | Kind | API Group | Version | Count |");
  lines.push("|----------|------|-----------|---------|-------|");
  for (const resource of result.resources) {
    lines.push(
      `| ${resource.fullName} | ${resource.kind} | ${groupLabel(resource.apiGroup)} | ${resource.apiVersion} | ${resource.count} |`
    );
  }
  return lines.join("\n");
}

/**
 * Format the most populated resource types
 */
export function formatTopResources(namespace: string, resources: CountedResourceType[]): string {
  if (resources.length === 0) {
    return `No objects found in ${namespace}.`;
  }

  const lines: string[] = [`# Top resources in ${namespace}\n`];
  resources.forEach((resource, index) => {
    lines.push(
      `${index + 1}. **${resource.name}** (${groupLabel(resource.apiGroup)}/${resource.apiVersion}) - ${resource.count} objects`
    );
  });
  return lines.join("\n");
}

/**
 * Format objects of one resource type
 */
export function formatObjects(namespace: string, resource: string, objects: ObjectSummary[]): string {
  if (objects.length === 0) {
    return `No ${resource} found in ${namespace}.`;
  }

  const lines: string[] = [`# ${resource} in ${namespace} (${objects.length} total)\n`];
  for (const object of objects) {
    lines.push(`## ${object.name}`);
    lines.push(`- **Kind:** ${object.kind}`);
    lines.push(`- **API Version:** ${object.apiVersion}`);
    lines.push(`- **Created:** ${object.creationTimestamp ?? "unknown"}`);
    lines.push(`- **Labels:** ${formatLabels(object.labels)}`);
    lines.push("");
  }
  return lines.join("\n");
}

/**
 * Format one object with spec and status
 */
export function formatObjectDetail(object: ObjectDetail): string {
  const lines: string[] = [
    `# ${object.kind} ${object.namespace}/${object.name}\n`,
    `- **API Version:** ${object.apiVersion}`,
    `- **Created:** ${object.creationTimestamp ?? "unknown"}`,
    `- **Labels:** ${formatLabels(object.labels)}`,
    `- **Annotations:** ${Object.keys(object.annotations).length}`,
  ];

  if (object.spec) {
    lines.push("\n## Spec\n");
    lines.push("```json", JSON.stringify(object.spec, null, 2), "```");
  }
  if (object.status) {
    lines.push("\n## Status\n");
    lines.push("```json", JSON.stringify(object.status, null, 2), "```");
  }
  return lines.join("\n");
}

export function formatRawObject(object: KubeObject): string {
  return ["```json", JSON.stringify(object, null, 2), "```"].join("\n");
}

/**
 * Format cache state
 */
export function formatCacheStatus(status: CacheStatus): string {
  const lines: string[] = ["# Cache Status\n"];

  lines.push("## API Resource Catalog");
  if (status.catalog.cached && status.catalog.ageMs !== undefined) {
    lines.push(`- **Resource types:** ${status.catalog.resourceCount}`);
    lines.push(`- **Age:** ${formatDuration(status.catalog.ageMs)}`);
  } else {
    lines.push("- Not cached");
  }
  lines.push(`- **TTL:** ${formatDuration(status.catalog.ttlMs)}`);
  lines.push("");

  lines.push(`## Namespaces (TTL ${formatDuration(status.namespaceTtlMs)})`);
  if (status.namespaces.length === 0) {
    lines.push("- None cached");
  }
  for (const entry of status.namespaces) {
    const stale = entry.ageMs >= status.namespaceTtlMs ? " [expired]" : "";
    lines.push(`- ${entry.namespace}: ${entry.resourceCount} resource types, cached ${formatDuration(entry.ageMs)} ago${stale}`);
  }
  lines.push("");
  lines.push(`Debug mode: ${status.debug ? "on" : "off"}`);
  return lines.join("\n");
}
