/**
 * Core interfaces for dependency injection.
 * These abstract away I/O operations for testability and portability.
 */

export interface FileSystem {
  readFile(path: string): string;
  exists(path: string): boolean;
}

export interface HttpClient {
  fetch(url: string, options?: RequestInit): Promise<Response>;
}

export interface Credentials {
  username?: string;
  password?: string;
}

/**
 * Supplies credentials that are not stored in the config file
 * (environment variables, a secret store, ...).
 */
export interface CredentialProvider {
  getCredentials(baseUrl: string): Credentials;
}
