/**
 * Test utilities - Mock factories for dependency injection interfaces
 */

import { pino } from "pino";
import type { CredentialProvider, FileSystem, HttpClient, Logger } from "#/core";

/**
 * Create a mock FileSystem with in-memory storage
 */
export function createMockFileSystem(
  initialFiles: Record<string, string> = {}
): FileSystem & { files: Map<string, string> } {
  const files = new Map(Object.entries(initialFiles));

  return {
    files,

    readFile(path: string): string {
      const content = files.get(path);
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${path}'`);
      }
      return content;
    },

    exists(path: string): boolean {
      return files.has(path);
    },
  };
}

/**
 * Recorded HTTP request
 */
interface HttpCall {
  url: string;
  options?: RequestInit;
}

/**
 * Create a mock HttpClient with predefined responses.
 * Unknown URLs get a 404. A factory that throws simulates a network failure.
 */
export function createMockHttpClient(
  responses: Map<string, Response | (() => Response)> = new Map()
): HttpClient & { responses: Map<string, Response | (() => Response)>; calls: HttpCall[] } {
  const calls: HttpCall[] = [];

  return {
    responses,
    calls,

    async fetch(url: string, options?: RequestInit): Promise<Response> {
      calls.push({ url, options });
      const responseOrFactory = responses.get(url);

      if (!responseOrFactory) {
        return new Response(null, {
          status: 404,
          statusText: "Not Found",
        });
      }

      return typeof responseOrFactory === "function"
        ? responseOrFactory()
        : responseOrFactory;
    },
  };
}

/**
 * Create an HttpClient that fails the test if it is ever called
 */
export function createForbiddenHttpClient(): HttpClient {
  return {
    async fetch(url: string): Promise<Response> {
      throw new Error(`Unexpected network request: ${url}`);
    },
  };
}

/**
 * Create a mock CredentialProvider
 */
export function createMockCredentialProvider(
  credentials: { username?: string; password?: string } = {}
): CredentialProvider & { requestedFor: string[] } {
  const requestedFor: string[] = [];

  return {
    requestedFor,

    getCredentials(baseUrl: string) {
      requestedFor.push(baseUrl);
      return { ...credentials };
    },
  };
}

/**
 * Logger that writes nothing
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Helper to create a successful JSON response
 */
export function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

/**
 * Helper to create a plain text response
 */
export function textResponse(text: string, status = 200): Response {
  return new Response(text, {
    status,
    headers: { "Content-Type": "text/plain" },
  });
}

/**
 * Helper to create an error response
 */
export function errorResponse(status: number, statusText: string): Response {
  return new Response(null, { status, statusText });
}
