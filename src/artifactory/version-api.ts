/**
 * Artifactory version search
 *
 * Wraps the two search endpoints used to discover versions:
 * - GET /api/search/versions      (all versions, newest first, integration flag per entry)
 * - GET /api/search/latestVersion (latest release as plain text)
 */

import type { HttpClient, Logger } from "#/core";
import { HttpStatusError, UnexpectedResponseError } from "#/errors";
import { VersionSearchResponseSchema } from "#/schemas";
import { LATEST_VERSION_SEARCH_PATH, VERSIONS_SEARCH_PATH } from "#/constants";
import type { QueryResult, VersionQueryService } from "./artifactory.types";
import { buildSearchUrl, getArtifactoryHeaders } from "./urls";
import { formatIssues } from "./issues";

export interface ArtifactoryVersionApiOptions {
  baseUrl: string;
  repository: string;
  http: HttpClient;
  logger: Logger;
  /** Value of the Authorization header sent with every request */
  authorization?: string | null;
}

export class ArtifactoryVersionApi implements VersionQueryService {
  private readonly baseUrl: string;
  private readonly repository: string;
  private readonly http: HttpClient;
  private readonly logger: Logger;
  private readonly headers: Record<string, string>;

  constructor(options: ArtifactoryVersionApiOptions) {
    this.baseUrl = options.baseUrl;
    this.repository = options.repository;
    this.http = options.http;
    this.logger = options.logger;
    this.headers = getArtifactoryHeaders(options.authorization);
  }

  async mostRecentVersions(
    group: string,
    artifact: string,
    limit: number,
    integration: boolean
  ): Promise<QueryResult<string[]>> {
    const url = buildSearchUrl(this.baseUrl, VERSIONS_SEARCH_PATH, this.repository, group, artifact);
    const fetched = await this.get(url);
    if (!fetched.success) return fetched;

    let body: unknown;
    try {
      body = await fetched.data.json();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return transportFailure(new UnexpectedResponseError(url, [`Invalid JSON: ${message}`]));
    }

    const parsed = VersionSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      return transportFailure(new UnexpectedResponseError(url, formatIssues(parsed.error)));
    }

    // Server order is newest first; keep it
    const versions = parsed.data.results
      .filter((entry) => entry.integration === integration)
      .slice(0, limit)
      .map((entry) => entry.version);

    this.logger.debug({ group, artifact, integration, count: versions.length }, "version search complete");
    return { success: true, data: versions };
  }

  async mostRecentRelease(group: string, artifact: string): Promise<QueryResult<string | null>> {
    const url = buildSearchUrl(this.baseUrl, LATEST_VERSION_SEARCH_PATH, this.repository, group, artifact);
    const fetched = await this.get(url);
    if (!fetched.success) return fetched;

    let text: string;
    try {
      text = (await fetched.data.text()).trim();
    } catch (err) {
      return transportFailure(err);
    }

    if (text === "") {
      return { success: true, data: null };
    }
    // A version is a single token; anything else is a proxy or login page
    if (/\s/.test(text) || text.startsWith("<")) {
      return transportFailure(
        new UnexpectedResponseError(url, [`Not a version: ${text.slice(0, 80)}`])
      );
    }
    return { success: true, data: text };
  }

  /**
   * GET a search URL, classifying failures.
   */
  private async get(url: string): Promise<QueryResult<Response>> {
    let response: Response;
    try {
      response = await this.http.fetch(url, { headers: this.headers });
    } catch (err) {
      this.logger.debug({ url, err }, "search request failed");
      return transportFailure(err);
    }

    this.logger.debug({ url, status: response.status }, "search request");

    if (!response.ok) {
      // Release the connection; the error body is not used
      await response.body?.cancel();
      const error = new HttpStatusError(url, response.status, response.statusText);
      if (response.status === 404) {
        return { success: false, error: { kind: "not-found", cause: error } };
      }
      return transportFailure(error);
    }

    return { success: true, data: response };
  }
}

function transportFailure(cause: unknown): { success: false; error: { kind: "transport"; cause: unknown } } {
  return { success: false, error: { kind: "transport", cause } };
}
