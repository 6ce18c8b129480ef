/**
 * Artifactory module
 *
 * Version discovery and URL construction against an Artifactory server,
 * behind the layout-neutral ArtifactClient interface.
 */

// Types
export * from "./artifactory.types";

// URL and header builders
export {
  buildMavenVersionUrl,
  buildSearchUrl,
  buildBasicAuthHeader,
  getArtifactoryHeaders,
  MavenArtifactUrlGenerator,
} from "./urls";

// Version search
export { ArtifactoryVersionApi, type ArtifactoryVersionApiOptions } from "./version-api";

// Config loading
export { formatIssues } from "./issues";
export { loadClientConfig, resolveClientConfig } from "./resolver";

// Factory (client creation)
export {
  newMavenClient,
  createArtifactClient,
  createArtifactClientFromFile,
  type ConfigFileDependencies,
} from "./factory";

// Clients (direct access if needed)
export { MavenArtifactClient } from "./clients/maven";
