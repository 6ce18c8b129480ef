import { z } from "zod";
import { LAYOUTS } from "#/constants";

// Trailing slashes would double up when URL segments are joined with "/"
const BaseUrlSchema = z
  .string()
  .url({ message: "Must be an absolute URL (e.g., https://artifactory.example.com/artifactory)" })
  .transform((url) => url.replace(/\/+$/, ""));

export const LayoutSchema = z.enum(LAYOUTS);
export type Layout = z.infer<typeof LayoutSchema>;

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

// Client config file (artifactory.yaml)
export const ClientConfigSchema = z.object({
  layout: LayoutSchema.default("maven"),
  baseUrl: BaseUrlSchema,
  repository: z.string().trim().min(1),
  snapshot: z.boolean().default(false),
  username: z.string().optional(),
  password: z.string().optional(),
  logLevel: LogLevelSchema.optional(),
});
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

// GET /api/search/versions
export const VersionSearchEntrySchema = z.object({
  version: z.string(),
  integration: z.boolean(),
});
export type VersionSearchEntry = z.infer<typeof VersionSearchEntrySchema>;

export const VersionSearchResponseSchema = z.object({
  results: z.array(VersionSearchEntrySchema),
});
export type VersionSearchResponse = z.infer<typeof VersionSearchResponseSchema>;
