/**
 * Global constants for artifactory-locator
 */

export const LOGGER_NAME = "artifactory-locator";
export const USER_AGENT = "artifactory-locator";

// How many versions getLatestVersions returns when no limit is given
export const DEFAULT_VERSION_LIMIT = 5;

// Repository layouts a client can be created for
export const LAYOUTS = ["maven"] as const;

// Artifactory search API endpoints, relative to the installation root
export const VERSIONS_SEARCH_PATH = "/api/search/versions";
export const LATEST_VERSION_SEARCH_PATH = "/api/search/latestVersion";
