/**
 * Configuration
 *
 * Read once from the environment at process start.
 */

export const DEFAULT_SKIP_RESOURCES = [
  "bindings",
  "localsubjectaccessreviews",
  "selfsubjectaccessreviews",
  "selfsubjectrulesreviews",
  "uploadtokenrequests",
  "tokenrequests",
  "subjectaccessreviews",
] as const;

export interface ExplorerConfig {
  catalogTtlMs: number;
  namespaceTtlMs: number;
  /** Budget for one count list call */
  countTimeoutMs: number;
  /** Page size of the first count list; a continue token triggers a full list */
  countPageSize: number;
  countConcurrency: number;
  /** Budget for object listing/get and namespace listing */
  objectTimeoutMs: number;
  skipResources: string[];
  /** HTTP statuses treated as an expected permission denial when counting */
  expectedDenialStatuses: number[];
  verboseProgress: boolean;
  progressBufferSize: number;
  progressEvery: number;
  kubeContext?: string;
  debug: boolean;
}

export type Env = Record<string, string | undefined>;

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const normalized = value.trim().toLowerCase();
  return normalized === "true" || normalized === "1" || normalized === "yes";
}

function parsePositiveInt(
  env: Env,
  key: string,
  fallback: number,
  problems: string[]
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    problems.push(`${key}=${raw} is not a positive integer, using ${fallback}`);
    return fallback;
  }
  return value;
}

function parseList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export interface LoadedConfig {
  config: ExplorerConfig;
  /** Invalid settings that were replaced by their defaults */
  problems: string[];
}

export function loadConfig(env: Env = process.env): LoadedConfig {
  const problems: string[] = [];
  const debug = parseFlag(env.DEBUG) ?? false;

  const statuses: number[] = [];
  for (const item of parseList(env.EXPECTED_DENIAL_STATUSES) ?? ["403", "405"]) {
    const status = Number(item);
    if (Number.isInteger(status) && status >= 400 && status < 600) {
      statuses.push(status);
    } else {
      problems.push(`EXPECTED_DENIAL_STATUSES entry ${item} is not an HTTP error status, ignored`);
    }
  }

  const config: ExplorerConfig = {
    catalogTtlMs: parsePositiveInt(env, "CATALOG_TTL_SECONDS", 300, problems) * 1000,
    namespaceTtlMs: parsePositiveInt(env, "NAMESPACE_TTL_SECONDS", 300, problems) * 1000,
    countTimeoutMs: parsePositiveInt(env, "COUNT_TIMEOUT_MS", 3000, problems),
    countPageSize: parsePositiveInt(env, "COUNT_PAGE_SIZE", 500, problems),
    countConcurrency: parsePositiveInt(env, "COUNT_CONCURRENCY", 8, problems),
    objectTimeoutMs: parsePositiveInt(env, "OBJECT_TIMEOUT_MS", 30000, problems),
    skipResources: parseList(env.SKIP_RESOURCES) ?? [...DEFAULT_SKIP_RESOURCES],
    expectedDenialStatuses: statuses,
    verboseProgress: parseFlag(env.VERBOSE_PROGRESS) ?? debug,
    progressBufferSize: parsePositiveInt(env, "PROGRESS_BUFFER_SIZE", 100, problems),
    progressEvery: parsePositiveInt(env, "PROGRESS_EVERY", 10, problems),
    kubeContext: env.KUBE_CONTEXT || undefined,
    debug,
  };

  return { config, problems };
}
