/**
 * Artifact client types and interfaces
 *
 * Callers only ever see an ArtifactClient. How a full name maps onto
 * repository paths and which search calls answer "latest version" is
 * decided by the layout-specific implementation.
 */

import type { HttpStatusError } from "#/errors";
import type { HttpClient, Logger } from "#/core";
import type { Layout } from "#/schemas";

/**
 * Client contract shared by every repository layout.
 *
 * For the Maven layout `fullName` is group and artifact joined by a dot
 * ("com.example.project.service"); a flat-namespace layout would treat it as
 * a plain package name.
 */
export interface ArtifactClient {
  readonly layout: Layout;

  /**
   * URL of one version of an artifact, optionally a variant selected by
   * descriptor (sources, javadoc, ...). Makes no network requests.
   */
  getVersionUrl(fullName: string, packaging: string, version: string, descriptor?: string): string;

  /**
   * Most recent version under the client's release/snapshot policy.
   * One network request.
   */
  getLatestVersion(fullName: string): Promise<string>;

  /**
   * Up to `limit` most recent versions, newest first. One network request.
   */
  getLatestVersions(fullName: string, limit?: number): Promise<string[]>;

  /**
   * URL of the most recent version. One network request.
   */
  getLatestVersionUrl(fullName: string, packaging: string, descriptor?: string): Promise<string>;
}

/**
 * Why a version query did not produce data.
 * "not-found" is the 404 case; everything else is "transport".
 */
export type QueryFailure =
  | { kind: "not-found"; cause: HttpStatusError }
  | { kind: "transport"; cause: unknown };

export type QueryResult<T> =
  | { success: true; data: T }
  | { success: false; error: QueryFailure };

/**
 * Version lookups against the repository's search API.
 * Implementations never throw; outcomes are classified as QueryResult.
 */
export interface VersionQueryService {
  /**
   * Newest-first versions of the artifact, at most `limit`, restricted to
   * integration (snapshot) or non-integration versions.
   * An empty list means the artifact exists but nothing matched.
   */
  mostRecentVersions(
    group: string,
    artifact: string,
    limit: number,
    integration: boolean
  ): Promise<QueryResult<string[]>>;

  /**
   * Most recent release version, or null when the server answered with none.
   */
  mostRecentRelease(group: string, artifact: string): Promise<QueryResult<string | null>>;
}

/**
 * Why artifactory.yaml could not be used
 */
export interface ConfigError {
  type: "io" | "yaml" | "validation";
  message: string;
  details?: string[];
}

export type ConfigResult<T> =
  | { success: true; data: T }
  | { success: false; error: ConfigError };

/**
 * Everything a MavenArtifactClient needs. Immutable once the client exists.
 */
export interface MavenClientConfig {
  baseUrl: string;
  repository: string;
  isSnapshot: boolean;
  versions: VersionQueryService;
  logger: Logger;
}

/**
 * Normalized client configuration.
 * Created by resolver from the config file, used by factory to create clients.
 */
export interface ResolvedClientConfig {
  layout: Layout;
  baseUrl: string;
  repository: string;
  isSnapshot: boolean;
  username?: string;
  password?: string;
}

/**
 * Options for newMavenClient
 */
export interface MavenClientOptions {
  isSnapshot?: boolean;
  username?: string;
  password?: string;
  http?: HttpClient;
  logger?: Logger;
}

/**
 * Injected collaborators for createArtifactClient
 */
export interface ClientDependencies {
  http?: HttpClient;
  logger?: Logger;
}
