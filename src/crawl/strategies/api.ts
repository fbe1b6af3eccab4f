import crypto from "node:crypto";
import { ApiSource } from "../../config";
import { buildDestinationPath } from "../../core/paths";
import { detectPeriod } from "../periods";
import { ArtifactRequest, DiscoveryStrategy } from "../types";

type TemplateVars = Record<string, string>;

function fill(template: string, vars: TemplateVars): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => vars[name] ?? match);
}

function fillValue(value: unknown, vars: TemplateVars): unknown {
  if (typeof value === "string") {
    return fill(value, vars);
  }
  if (Array.isArray(value)) {
    return value.map((item) => fillValue(item, vars));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, fillValue(item, vars)]));
  }
  return value;
}

/** JSON with object keys sorted, so equal bodies hash equally whatever their key order. */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(",")}]`;
  }
  if (value !== null && typeof value === "object") {
    const fields = Object.entries(value)
      .filter(([, item]) => item !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, item]) => `${JSON.stringify(key)}:${canonicalJson(item)}`);
    return `{${fields.join(",")}}`;
  }
  return JSON.stringify(value) ?? "null";
}

/** `endpoint#<12 hex of sha256(body)>`; the endpoint alone when there is no body. The API key never takes part. */
export function apiLocator(endpoint: string, body: unknown): string {
  if (body === undefined) {
    return endpoint;
  }
  const digest = crypto.createHash("sha256").update(canonicalJson(body)).digest("hex").slice(0, 12);
  return `${endpoint}#${digest}`;
}

export const discoverApi: DiscoveryStrategy<ApiSource> = async (source, ctx) => {
  const year = ctx.now.getUTCFullYear();
  const vars: TemplateVars = { year: String(year), previousYear: String(year - 1) };
  const body = source.body === undefined ? undefined : fillValue(source.body, vars);
  const filename = fill(source.filename, vars);
  const period = source.period ? fill(source.period, vars) : undefined;

  const env = ctx.env ?? process.env;
  const apiKey = source.apiKeyEnv ? env[source.apiKeyEnv] : undefined;
  if (source.apiKeyEnv && !apiKey) {
    ctx.logger.warn("discovery_api_key_missing", { source: source.name, env: source.apiKeyEnv });
  }

  const request: ArtifactRequest = { url: source.endpoint, method: source.method, headers: { ...source.headers } };
  if (source.method === "POST") {
    const payload = apiKey && body !== null && typeof body === "object" ? { ...body, [source.apiKeyField]: apiKey } : body;
    request.headers = { "content-type": "application/json", ...source.headers };
    request.body = JSON.stringify(payload ?? {});
  } else if (apiKey) {
    const url = new URL(source.endpoint);
    url.searchParams.set(source.apiKeyField, apiKey);
    request.url = url.toString();
  }

  return {
    candidates: [
      {
        remoteLocator: apiLocator(source.endpoint, body),
        destinationPath: buildDestinationPath(source.group, period, filename),
        title: source.name,
        period: detectPeriod(period ?? filename),
        request,
      },
    ],
    warnings: [],
    pagesVisited: 0,
  };
};
