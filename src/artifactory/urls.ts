/**
 * URL and header builders
 *
 * All pure functions. Nothing here validates its input: a malformed
 * coordinate produces a malformed URL.
 */

import { getArtifactFilename } from "#/artifact";
import { USER_AGENT } from "#/constants";

/**
 * Build the URL of an artifact file in a Maven layout repository.
 *
 * @example
 * buildMavenVersionUrl("https://x/artifactory", "libs-release", "com.example.users", "service", "war", "1.6.0")
 * → "https://x/artifactory/libs-release/com/example/users/service/1.6.0/service-1.6.0.war"
 */
export function buildMavenVersionUrl(
  baseUrl: string,
  repository: string,
  group: string,
  artifact: string,
  packaging: string,
  version: string,
  descriptor?: string
): string {
  const groupPath = group.replaceAll(".", "/");
  const filename = getArtifactFilename(artifact, version, packaging, descriptor);

  return [baseUrl, repository, groupPath, artifact, version, filename].join("/");
}

/**
 * Maven layout URLs bound to one repository.
 */
export class MavenArtifactUrlGenerator {
  private readonly baseUrl: string;
  private readonly repository: string;

  constructor(baseUrl: string, repository: string) {
    this.baseUrl = baseUrl;
    this.repository = repository;
  }

  getVersionUrl(
    group: string,
    artifact: string,
    packaging: string,
    version: string,
    descriptor?: string
  ): string {
    return buildMavenVersionUrl(
      this.baseUrl,
      this.repository,
      group,
      artifact,
      packaging,
      version,
      descriptor
    );
  }
}

/**
 * Build an Artifactory search API URL for one artifact in one repository.
 *
 * @example
 * buildSearchUrl("https://x/artifactory", "/api/search/versions", "libs-release", "com.example", "service")
 * → "https://x/artifactory/api/search/versions?g=com.example&a=service&repos=libs-release"
 */
export function buildSearchUrl(
  baseUrl: string,
  searchPath: string,
  repository: string,
  group: string,
  artifact: string
): string {
  const params = new URLSearchParams({ g: group, a: artifact, repos: repository });
  return `${baseUrl}${searchPath}?${params.toString()}`;
}

/**
 * Basic auth header value, or null unless both username and password are set.
 */
export function buildBasicAuthHeader(username?: string, password?: string): string | null {
  if (username === undefined || password === undefined) {
    return null;
  }
  const encoded = Buffer.from(`${username}:${password}`, "utf-8").toString("base64");
  return `Basic ${encoded}`;
}

/**
 * Get headers for Artifactory API requests.
 */
export function getArtifactoryHeaders(authorization?: string | null): Record<string, string> {
  const headers: Record<string, string> = {
    Accept: "application/json",
    "User-Agent": USER_AGENT,
  };

  if (authorization) {
    headers.Authorization = authorization;
  }

  return headers;
}
