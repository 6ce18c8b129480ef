/**
 * Node-backed implementations of the core interfaces.
 */

import { existsSync, readFileSync } from "fs";
import type { CredentialProvider, FileSystem, HttpClient } from "./interfaces";

export const nodeHttpClient: HttpClient = {
  fetch(url: string, options?: RequestInit): Promise<Response> {
    return fetch(url, options);
  },
};

export const nodeFileSystem: FileSystem = {
  readFile(path: string): string {
    return readFileSync(path, "utf-8");
  },
  exists(path: string): boolean {
    return existsSync(path);
  },
};

/**
 * Read credentials from ARTIFACTORY_USERNAME / ARTIFACTORY_PASSWORD.
 * The same pair is used for every server.
 */
export function createEnvCredentialProvider(
  env: NodeJS.ProcessEnv = process.env
): CredentialProvider {
  return {
    getCredentials() {
      return {
        username: env.ARTIFACTORY_USERNAME || undefined,
        password: env.ARTIFACTORY_PASSWORD || undefined,
      };
    },
  };
}
