/**
 * artifactory-locator
 *
 * Resolve artifact URLs and discover latest versions on an Artifactory server.
 * Portable, testable, dependency-injected.
 */

// Core interfaces and Node-backed defaults
export * from "#/core";

// Error taxonomy
export * from "#/errors";

// Schemas (Zod validation)
export * from "#/schemas";

// Artifact naming (full name splitting, filenames)
export * from "#/artifact";

// Artifactory clients, version search, factory
export * from "#/artifactory";

export { DEFAULT_VERSION_LIMIT } from "#/constants";
