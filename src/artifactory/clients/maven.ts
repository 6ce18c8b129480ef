/**
 * Maven layout client
 *
 * Full names are "<groupId>.<artifactId>". Searches are limited to the
 * repository the client was created for, so release lookups fail against a
 * repository that only holds snapshots and the other way round.
 *
 * Safe for concurrent use: all state is fixed at construction.
 */

import type { Logger } from "#/core";
import { DEFAULT_VERSION_LIMIT } from "#/constants";
import { InvalidArgumentError, NoMatchingVersionsError } from "#/errors";
import { splitFullName } from "#/artifact";
import type {
  ArtifactClient,
  MavenClientConfig,
  QueryResult,
  VersionQueryService,
} from "../artifactory.types";
import { MavenArtifactUrlGenerator } from "../urls";

export class MavenArtifactClient implements ArtifactClient {
  readonly layout = "maven";
  private readonly isSnapshot: boolean;
  private readonly versions: VersionQueryService;
  private readonly urls: MavenArtifactUrlGenerator;
  private readonly logger: Logger;

  constructor(config: MavenClientConfig) {
    this.isSnapshot = config.isSnapshot;
    this.versions = config.versions;
    this.urls = new MavenArtifactUrlGenerator(config.baseUrl, config.repository);
    this.logger = config.logger;
  }

  /**
   * @example
   * client.getVersionUrl("com.example.users.service", "jar", "1.4.5", "sources")
   * → "https://x/artifactory/libs-release/com/example/users/service/1.4.5/service-1.4.5-sources.jar"
   */
  getVersionUrl(fullName: string, packaging: string, version: string, descriptor?: string): string {
    const { group, artifact } = splitFullName(fullName);
    return this.urls.getVersionUrl(group, artifact, packaging, version, descriptor);
  }

  async getLatestVersion(fullName: string): Promise<string> {
    const { group, artifact } = splitFullName(fullName);

    if (this.isSnapshot) {
      const result = await this.versions.mostRecentVersions(group, artifact, 1, true);
      const [latest] = this.unwrap(result, group, artifact);
      if (latest === undefined) {
        throw this.noMatchingVersions(group, artifact);
      }
      return latest;
    }

    const result = await this.versions.mostRecentRelease(group, artifact);
    const latest = this.unwrap(result, group, artifact);
    if (latest === null) {
      throw this.noMatchingVersions(group, artifact);
    }
    return latest;
  }

  /**
   * @example
   * await client.getLatestVersions("com.example.users.service", 3) → ["1.6.0", "1.5.4", "1.5.3"]
   */
  async getLatestVersions(fullName: string, limit: number = DEFAULT_VERSION_LIMIT): Promise<string[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError(`Version limit must be a positive integer, got ${limit}`);
    }

    const { group, artifact } = splitFullName(fullName);
    const result = await this.versions.mostRecentVersions(group, artifact, limit, this.isSnapshot);
    const versions = this.unwrap(result, group, artifact);

    // A 200 with no results and a 404 mean the same thing to callers
    if (versions.length === 0) {
      throw this.noMatchingVersions(group, artifact);
    }
    return versions;
  }

  async getLatestVersionUrl(fullName: string, packaging: string, descriptor?: string): Promise<string> {
    const version = await this.getLatestVersion(fullName);
    return this.getVersionUrl(fullName, packaging, version, descriptor);
  }

  /**
   * Return query data, or throw: NoMatchingVersionsError for a 404,
   * the original error for any other failure.
   */
  private unwrap<T>(result: QueryResult<T>, group: string, artifact: string): T {
    if (result.success) {
      return result.data;
    }

    switch (result.error.kind) {
      case "not-found":
        throw this.noMatchingVersions(group, artifact, result.error.cause);
      case "transport":
        this.logger.warn({ group, artifact, err: result.error.cause }, "version lookup failed");
        throw result.error.cause;
    }
  }

  private noMatchingVersions(group: string, artifact: string, cause?: unknown): NoMatchingVersionsError {
    this.logger.debug({ group, artifact, integration: this.isSnapshot }, "no matching versions");
    return new NoMatchingVersionsError(group, artifact, this.isSnapshot, cause);
  }
}
