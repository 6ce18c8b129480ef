/**
 * Client config resolver
 *
 * Loads artifactory.yaml and normalizes it to ResolvedClientConfig.
 * Parse once, never parse again - downstream code only sees ResolvedClientConfig.
 */

import { parseDocument } from "yaml";
import type { CredentialProvider, FileSystem } from "#/core";
import { ClientConfigSchema, type ClientConfig } from "#/schemas";
import type { ConfigResult, ResolvedClientConfig } from "./artifactory.types";
import { formatIssues } from "./issues";

/**
 * Read and validate a client config file.
 *
 * An empty file is an empty mapping, so it reports the missing
 * baseUrl and repository keys.
 */
export function loadClientConfig(fs: FileSystem, path: string): ConfigResult<ClientConfig> {
  if (!fs.exists(path)) {
    return {
      success: false,
      error: { type: "io", message: `Config file not found: ${path}` },
    };
  }

  let content: string;
  try {
    content = fs.readFile(path);
  } catch (err) {
    return {
      success: false,
      error: {
        type: "io",
        message: `Failed to read ${path}`,
        details: [err instanceof Error ? err.message : String(err)],
      },
    };
  }

  const document = parseDocument(content);
  if (document.errors.length > 0) {
    return {
      success: false,
      error: {
        type: "yaml",
        message: `Invalid YAML syntax in ${path}`,
        // Drop the code frame yaml appends after the first line
        details: document.errors.map((e) => e.message.split("\n")[0] ?? e.message),
      },
    };
  }

  const raw: unknown = document.toJS() ?? {};
  const parsed = ClientConfigSchema.safeParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: {
        type: "validation",
        message: `Invalid configuration in ${path}`,
        details: formatIssues(parsed.error),
      },
    };
  }

  return { success: true, data: parsed.data };
}

/**
 * Resolve a parsed config into client settings.
 *
 * Credential priority, per field:
 * 1. Value in the config file
 * 2. CredentialProvider (e.g. ARTIFACTORY_USERNAME / ARTIFACTORY_PASSWORD)
 */
export function resolveClientConfig(
  config: ClientConfig,
  credentials?: CredentialProvider
): ResolvedClientConfig {
  const provided = credentials?.getCredentials(config.baseUrl) ?? {};

  return {
    layout: config.layout,
    baseUrl: config.baseUrl,
    repository: config.repository,
    isSnapshot: config.snapshot,
    username: config.username ?? provided.username,
    password: config.password ?? provided.password,
  };
}
