import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { RegistryError } from "../core/errors";

export const DEFAULT_EXTENSIONS = [".pdf", ".xls", ".xlsx", ".csv", ".json", ".zip"];

const PeriodLayoutSchema = z.enum(["none", "year", "fiscal_year", "month"]);

const LinkFilterShape = {
  selector: z.string().min(1).default("a[href]"),
  extensions: z.array(z.string().min(1)).default(DEFAULT_EXTENSIONS),
  regexFilters: z.array(z.string()).default([]),
  pattern: z.string().optional(),
  exclude: z.array(z.string()).default([]),
  withinMonths: z.number().int().positive().optional(),
  limit: z.number().int().positive().optional(),
  periodLayout: PeriodLayoutSchema.default("none"),
};

const BaseShape = {
  name: z.string().min(1),
  group: z.string().min(1),
  notes: z.string().optional(),
  enabled: z.boolean().default(true),
};

const DirectSourceSchema = z.object({
  ...BaseShape,
  strategy: z.literal("direct"),
  url: z.string().url(),
  filename: z.string().min(1).optional(),
  period: z.string().min(1).optional(),
});

const ListingSourceSchema = z.object({
  ...BaseShape,
  ...LinkFilterShape,
  strategy: z.literal("listing"),
  pageUrl: z.string().url().optional(),
  pageUrls: z.array(z.string().url()).optional(),
});

const PaginatedSourceSchema = z.object({
  ...BaseShape,
  ...LinkFilterShape,
  strategy: z.literal("paginated"),
  pageUrl: z.string().url(),
  pageParam: z.string().min(1).default("page"),
  pageUrlTemplate: z.string().includes("{page}").optional(),
  startPage: z.number().int().min(0).default(1),
  maxPages: z.number().int().positive().optional(),
});

const YearRangeSchema = z
  .object({
    from: z.number().int(),
    to: z.number().int(),
  })
  .refine((range) => range.from <= range.to, { message: "yearRange.from must not exceed yearRange.to" });

const TraversalLevelSchema = z.object({
  selector: z.string().min(1).default("a[href]"),
  pattern: z.string().min(1),
  yearRange: YearRangeSchema.optional(),
});

const HierarchicalSourceSchema = z.object({
  ...BaseShape,
  ...LinkFilterShape,
  strategy: z.literal("hierarchical"),
  pageUrl: z.string().url(),
  levels: z.array(TraversalLevelSchema).min(1).max(2),
});

const RenderedSourceSchema = z.object({
  ...BaseShape,
  ...LinkFilterShape,
  strategy: z.literal("rendered"),
  pageUrl: z.string().url(),
  waitForSelector: z.string().min(1).optional(),
});

const ManualSourceSchema = z.object({
  ...BaseShape,
  strategy: z.literal("manual"),
  pageUrl: z.string().url(),
  reason: z.string().default("Requires authentication; manual download needed"),
});

/**
 * A JSON API queried with a fixed request. `{year}` and `{previousYear}` in
 * string body values, `filename` and `period` are filled from the run date.
 */
const ApiSourceSchema = z.object({
  ...BaseShape,
  strategy: z.literal("api"),
  endpoint: z.string().url(),
  method: z.enum(["GET", "POST"]).default("POST"),
  body: z.record(z.unknown()).optional(),
  headers: z.record(z.string()).default({}),
  apiKeyEnv: z.string().min(1).optional(),
  apiKeyField: z.string().min(1).default("registrationkey"),
  filename: z.string().min(1),
  period: z.string().min(1).optional(),
});

export const SourceDescriptorSchema = z.discriminatedUnion("strategy", [
  DirectSourceSchema,
  ListingSourceSchema,
  PaginatedSourceSchema,
  HierarchicalSourceSchema,
  RenderedSourceSchema,
  ManualSourceSchema,
  ApiSourceSchema,
]);

export const SourceRegistrySchema = z
  .object({
    version: z.union([z.string(), z.number()]).transform(String),
    sources: z.array(SourceDescriptorSchema),
  })
  .superRefine((registry, ctx) => {
    const seen = new Set<string>();
    registry.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate source name "${source.name}"`,
          path: ["sources", index, "name"],
        });
      }
      seen.add(source.name);

      if (source.strategy === "listing" && !source.pageUrl && (source.pageUrls?.length ?? 0) === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "listing sources need pageUrl or pageUrls",
          path: ["sources", index, "pageUrl"],
        });
      }

      if (source.strategy === "api" && source.method === "GET" && source.body !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "GET api sources take no body",
          path: ["sources", index, "body"],
        });
      }
    });
  });

export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;
export type DirectSource = z.infer<typeof DirectSourceSchema>;
export type ListingSource = z.infer<typeof ListingSourceSchema>;
export type PaginatedSource = z.infer<typeof PaginatedSourceSchema>;
export type HierarchicalSource = z.infer<typeof HierarchicalSourceSchema>;
export type RenderedSource = z.infer<typeof RenderedSourceSchema>;
export type ManualSource = z.infer<typeof ManualSourceSchema>;
export type ApiSource = z.infer<typeof ApiSourceSchema>;
export type TraversalLevel = z.infer<typeof TraversalLevelSchema>;
export type PeriodLayout = z.infer<typeof PeriodLayoutSchema>;
export type SourceRegistry = z.infer<typeof SourceRegistrySchema>;
export type StrategyKind = SourceDescriptor["strategy"];

export type LinkFilter = Pick<
  ListingSource,
  "selector" | "extensions" | "regexFilters" | "pattern" | "exclude" | "withinMonths" | "limit" | "periodLayout"
>;

export function parseSourceRegistry(input: unknown, origin = "<inline>"): SourceRegistry {
  const parsed = SourceRegistrySchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new RegistryError(`Invalid source registry ${origin}: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}

export function loadSourceRegistry(registryPath: string): SourceRegistry {
  const absolutePath = path.resolve(registryPath);
  if (!fs.existsSync(absolutePath)) {
    throw new RegistryError(`Source registry not found: ${absolutePath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(absolutePath, "utf-8"));
  } catch (error) {
    throw new RegistryError(
      `Source registry ${absolutePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  return parseSourceRegistry(raw, absolutePath);
}
