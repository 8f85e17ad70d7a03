#!/usr/bin/env node
/**
 * Kubernetes Explorer MCP Server
 *
 * Model Context Protocol server that reports, per namespace, which resource
 * types the cluster serves and how many objects of each exist. Discovery
 * and counts are cached so repeated questions stay fast.
 */
import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListToolsRequestSchema,
  ReadResourceRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createKubeClient } from "./client.js";
import { loadConfig } from "./config.js";
import { getErrorMessage, isUnavailable } from "./errors.js";
import { ResourceExplorer } from "./explorer.js";
import {
  formatCacheStatus,
  formatNamespaceResources,
  formatNamespaces,
  formatObjectDetail,
  formatObjects,
  formatRawObject,
  formatTopResources,
} from "./formatters.js";
import { createLogger } from "./logger.js";
import { scanNamespace } from "./tools/namespaceScan.js";
import type { ClusterApi, ResourceFilters } from "./types.js";

const { config, problems } = loadConfig();
const logger = createLogger("kube-explorer", { debug: config.debug });

type ToolArgs = Record<string, unknown> | undefined;

function requireString(args: ToolArgs, key: string): string {
  const value = args?.[key];
  if (typeof value !== "string" || value.trim() === "") {
    throw new Error(`${key} is required`);
  }
  return value.trim();
}

function optionalString(args: ToolArgs, key: string): string | undefined {
  const value = args?.[key];
  return typeof value === "string" && value.trim() !== "" ? value.trim() : undefined;
}

function readFilters(args: ToolArgs): ResourceFilters {
  return {
    search: optionalString(args, "search"),
    populatedOnly: args?.populated_only === true || args?.populated_only === "true",
    apiGroup: optionalString(args, "api_group"),
  };
}

function text(value: string) {
  return { content: [{ type: "text" as const, text: value }] };
}

function failureText(error: unknown): string {
  const message = getErrorMessage(error);
  return isUnavailable(error) ? `Service unavailable: ${message}` : `Error: ${message}`;
}

const namespaceArg = {
  namespace: {
    type: "string",
    description: "Namespace name",
  },
};

const objectArgs = {
  ...namespaceArg,
  resource: {
    type: "string",
    description: "Resource type, full name (deployments.apps) or plain name (pods)",
  },
  name: {
    type: "string",
    description: "Object name",
  },
};

function createServer(explorer: ResourceExplorer): Server {
  const server = new Server(
    {
      name: "kube-explorer-mcp-server",
      version: "0.1.0",
    },
    {
      capabilities: {
        resources: {},
        tools: {},
      },
    }
  );

  /**
   * List available resources
   */
  server.setRequestHandler(ListResourcesRequestSchema, async () => {
    return {
      resources: [
        {
          uri: "kube-explorer://namespaces",
          name: "Namespaces",
          description: "All namespaces of the connected cluster",
          mimeType: "text/plain",
        },
        {
          uri: "kube-explorer://cache",
          name: "Cache Status",
          description: "Age and size of the resource catalog and namespace caches",
          mimeType: "text/plain",
        },
      ],
    };
  });

  /**
   * Read resource content
   */
  server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
    const { uri } = request.params;

    try {
      switch (uri) {
        case "kube-explorer://namespaces": {
          const namespaces = await explorer.listNamespaces();
          return {
            contents: [{ uri, mimeType: "text/plain", text: formatNamespaces(namespaces) }],
          };
        }

        case "kube-explorer://cache": {
          return {
            contents: [{ uri, mimeType: "text/plain", text: formatCacheStatus(explorer.getCacheStatus()) }],
          };
        }

        default:
          throw new Error(`Unknown resource: ${uri}`);
      }
    } catch (error) {
      return {
        contents: [
          {
            uri,
            mimeType: "text/plain",
            text: `Error fetching resource: ${failureText(error)}`,
          },
        ],
      };
    }
  });

  /**
   * List available tools
   */
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: [
        // ============== Discovery Tools ==============
        {
          name: "list_namespaces",
          description: "List all namespaces in the cluster",
          inputSchema: {
            type: "object",
            properties: {},
            required: [],
          },
        },
        {
          name: "get_namespace_resources",
          description:
            "List the namespaced resource types of the cluster with the number of objects of each in a namespace. Results are cached for a few minutes; send a progress token to follow a fresh scan.",
          inputSchema: {
            type: "object",
            properties: {
              ...namespaceArg,
              search: {
                type: "string",
                description: "Only resource types whose name or kind contains this text",
              },
              populated_only: {
                type: "boolean",
                description: "Only resource types with at least one object",
              },
              api_group: {
                type: "string",
                description: "Only resource types of this API group (use 'core' for the core group)",
              },
            },
            required: ["namespace"],
          },
        },
        {
          name: "get_top_resources",
          description: "The most populated resource types of a namespace",
          inputSchema: {
            type: "object",
            properties: {
              ...namespaceArg,
              limit: {
                type: "number",
                description: "Number of resource types to show (default: 15)",
              },
            },
            required: ["namespace"],
          },
        },
        {
          name: "export_namespace_csv",
          description: "Export a namespace's resource types and counts as CSV",
          inputSchema: {
            type: "object",
            properties: { ...namespaceArg },
            required: ["namespace"],
          },
        },
        // ============== Object Tools ==============
        {
          name: "get_resource_objects",
          description: "List the objects of one resource type in a namespace",
          inputSchema: {
            type: "object",
            properties: {
              ...namespaceArg,
              resource: objectArgs.resource,
            },
            required: ["namespace", "resource"],
          },
        },
        {
          name: "get_object",
          description: "Show one object with its labels, spec and status",
          inputSchema: {
            type: "object",
            properties: objectArgs,
            required: ["namespace", "resource", "name"],
          },
        },
        {
          name: "get_raw_object",
          description: "Return the complete object document as the API server serves it",
          inputSchema: {
            type: "object",
            properties: objectArgs,
            required: ["namespace", "resource", "name"],
          },
        },
        // ============== Cache Tools ==============
        {
          name: "clear_cache",
          description: "Drop the cached resource catalog and all cached namespace counts",
          inputSchema: {
            type: "object",
            properties: {},
            required: [],
          },
        },
        {
          name: "get_cache_status",
          description: "Show what is cached and how old it is",
          inputSchema: {
            type: "object",
            properties: {},
            required: [],
          },
        },
      ],
    };
  });

  /**
   * Handle tool calls
   */
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;

    try {
      switch (name) {
        case "list_namespaces": {
          const namespaces = await explorer.listNamespaces();
          return text(formatNamespaces(namespaces));
        }

        case "get_namespace_resources": {
          const namespace = requireString(args, "namespace");
          const filters = readFilters(args);
          const progressToken = request.params._meta?.progressToken;

          if (progressToken === undefined) {
            const result = await explorer.getNamespaceResources(namespace, filters, { signal: extra.signal });
            return text(formatNamespaceResources(result, filters));
          }

          let step = 0;
          const output = await scanNamespace(
            explorer,
            namespace,
            filters,
            async (event, message) => {
              step++;
              await extra.sendNotification({
                method: "notifications/progress",
                params: {
                  progressToken,
                  progress: event.type === "progress" ? event.processed : step,
                  ...(event.type === "progress" ? { total: event.total } : {}),
                  message,
                },
              });
            },
            extra.signal
          );
          return text(output);
        }

        case "get_top_resources": {
          const namespace = requireString(args, "namespace");
          const limit = typeof args?.limit === "number" && args.limit > 0 ? Math.floor(args.limit) : 15;
          const resources = await explorer.getTopResources(namespace, limit);
          return text(formatTopResources(namespace, resources));
        }

        case "export_namespace_csv": {
          const namespace = requireString(args, "namespace");
          return text(await explorer.exportNamespaceCsv(namespace));
        }

        case "get_resource_objects": {
          const namespace = requireString(args, "namespace");
          const resource = requireString(args, "resource");
          const objects = await explorer.getResourceObjects(namespace, resource);
          return text(formatObjects(namespace, resource, objects));
        }

        case "get_object": {
          const object = await explorer.getObject(
            requireString(args, "namespace"),
            requireString(args, "resource"),
            requireString(args, "name")
          );
          return text(formatObjectDetail(object));
        }

        case "get_raw_object": {
          const object = await explorer.getRawObject(
            requireString(args, "namespace"),
            requireString(args, "resource"),
            requireString(args, "name")
          );
          return text(formatRawObject(object));
        }

        case "clear_cache": {
          const result = explorer.clearCache();
          return text(`Status: ${result.status}`);
        }

        case "get_cache_status": {
          return text(formatCacheStatus(explorer.getCacheStatus()));
        }

        default:
          throw new Error(`Unknown tool: ${name}`);
      }
    } catch (error) {
      return {
        content: [
          {
            type: "text",
            text: failureText(error),
          },
        ],
        isError: true,
      };
    }
  });

  return server;
}

async function connectCluster(): Promise<ClusterApi | undefined> {
  try {
    return await createKubeClient(config, logger);
  } catch (error) {
    logger.warn(`Failed to initialize Kubernetes client: ${getErrorMessage(error)}`);
    logger.warn("The server will start but Kubernetes features will be unavailable");
    return undefined;
  }
}

/**
 * Start the server
 */
async function main() {
  for (const problem of problems) {
    logger.warn(problem);
  }

  const cluster = await connectCluster();
  const explorer = new ResourceExplorer(cluster, { config, logger });
  const server = createServer(explorer);

  const shutdown = () => {
    explorer.clearCache();
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error("Failed to close server", error);
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info("Kubernetes Explorer MCP Server running on stdio");
  if (config.debug) {
    logger.info("Debug mode enabled (DEBUG=true)");
  }
}

main().catch((error) => {
  logger.error("Fatal error:", error);
  process.exit(1);
});
