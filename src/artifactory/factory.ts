/**
 * Artifact client factory
 *
 * Single decision point for creating artifact clients.
 * The factory is the ONLY place that knows about specific client implementations.
 */

import {
  createEnvCredentialProvider,
  createLogger,
  nodeFileSystem,
  nodeHttpClient,
  type CredentialProvider,
  type FileSystem,
  type HttpClient,
  type Logger,
} from "#/core";
import type {
  ArtifactClient,
  ClientDependencies,
  ConfigResult,
  MavenClientOptions,
  ResolvedClientConfig,
} from "./artifactory.types";
import { loadClientConfig, resolveClientConfig } from "./resolver";
import { MavenArtifactClient } from "./clients/maven";
import { ArtifactoryVersionApi } from "./version-api";
import { buildBasicAuthHeader } from "./urls";

/**
 * Create a client for a Maven layout repository. Makes no network requests.
 *
 * Credentials are sent with every request as HTTP Basic auth, but only when
 * both username and password are given.
 *
 * @example
 * const client = newMavenClient("https://www.example.com/artifactory", "libs-release");
 * await client.getLatestVersionUrl("com.example.users.service", "war");
 * → "https://www.example.com/artifactory/libs-release/com/example/users/service/1.6.0/service-1.6.0.war"
 */
export function newMavenClient(
  baseUrl: string,
  repository: string,
  options: MavenClientOptions = {}
): ArtifactClient {
  const logger = options.logger ?? createLogger();
  const http: HttpClient = options.http ?? nodeHttpClient;
  const authorization = buildBasicAuthHeader(options.username, options.password);

  if (authorization === null && (options.username !== undefined || options.password !== undefined)) {
    logger.warn({ baseUrl }, "username and password must both be set; sending requests without auth");
  }

  const versions = new ArtifactoryVersionApi({ baseUrl, repository, http, logger, authorization });

  return new MavenArtifactClient({
    baseUrl,
    repository,
    isSnapshot: options.isSnapshot ?? false,
    versions,
    logger,
  });
}

/**
 * Create a client for the resolved configuration's layout
 */
export function createArtifactClient(
  config: ResolvedClientConfig,
  deps: ClientDependencies = {}
): ArtifactClient {
  const logger: Logger = deps.logger ?? createLogger();

  switch (config.layout) {
    case "maven":
      return newMavenClient(config.baseUrl, config.repository, {
        isSnapshot: config.isSnapshot,
        username: config.username,
        password: config.password,
        http: deps.http,
        logger,
      });
  }
}

export interface ConfigFileDependencies extends ClientDependencies {
  fs?: FileSystem;
  credentials?: CredentialProvider;
}

/**
 * Create a client from an artifactory.yaml file.
 *
 * Credentials missing from the file come from the environment unless a
 * CredentialProvider is given. Without an injected logger, one is created at
 * the file's logLevel.
 */
export function createArtifactClientFromFile(
  path: string,
  deps: ConfigFileDependencies = {}
): ConfigResult<ArtifactClient> {
  const loaded = loadClientConfig(deps.fs ?? nodeFileSystem, path);
  if (!loaded.success) return loaded;

  const resolved = resolveClientConfig(loaded.data, deps.credentials ?? createEnvCredentialProvider());
  const logger = deps.logger ?? createLogger({ level: loaded.data.logLevel });

  return { success: true, data: createArtifactClient(resolved, { http: deps.http, logger }) };
}
