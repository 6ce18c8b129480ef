/**
 * Error taxonomy
 *
 * Callers of an ArtifactClient handle three outcomes besides success:
 * InvalidArgumentError (their own bug), NoMatchingVersionsError (nothing
 * published under the client's release/snapshot policy) and any transport
 * error, which is passed through untouched.
 */

export class InvalidArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}

/**
 * Non-2xx response from the repository server
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;

  constructor(url: string, status: number, statusText: string) {
    super(`Request to ${url} failed: ${status} ${statusText}`.trimEnd());
    this.name = "HttpStatusError";
    this.url = url;
    this.status = status;
    this.statusText = statusText;
  }
}

/**
 * 2xx response whose body is not what the search API returns
 */
export class UnexpectedResponseError extends Error {
  readonly url: string;
  readonly details: string[];

  constructor(url: string, details: string[]) {
    super(`Unexpected response from ${url}`);
    this.name = "UnexpectedResponseError";
    this.url = url;
    this.details = details;
  }
}

export class NoMatchingVersionsError extends Error {
  readonly group: string;
  readonly artifact: string;
  readonly integration: boolean;

  constructor(group: string, artifact: string, integration: boolean, cause?: unknown) {
    const versionType = integration ? "integration" : "non-integration";
    super(
      `No ${versionType} versions of ${group}.${artifact} could be found. ` +
        `It might be the case that there have not been any ${versionType} deployments done yet.`,
      cause === undefined ? undefined : { cause }
    );
    this.name = "NoMatchingVersionsError";
    this.group = group;
    this.artifact = artifact;
    this.integration = integration;
  }
}
