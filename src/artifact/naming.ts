import { InvalidArgumentError } from "#/errors";

export interface ArtifactCoordinates {
  group: string;
  artifact: string;
}

/**
 * Split a dotted full name into group and artifact on the last ".".
 *
 * @example splitFullName("com.example.users.service") → { group: "com.example.users", artifact: "service" }
 */
export function splitFullName(fullName: string): ArtifactCoordinates {
  const index = fullName.lastIndexOf(".");
  if (index === -1) {
    throw new InvalidArgumentError(
      `Invalid artifact name: ${fullName}. Expected format: group.artifact (e.g., com.example.service)`
    );
  }

  return {
    group: fullName.slice(0, index),
    artifact: fullName.slice(index + 1),
  };
}

/**
 * Filename of an artifact file inside its version directory.
 *
 * @example getArtifactFilename("service", "1.4.5", "jar", "sources") → "service-1.4.5-sources.jar"
 */
export function getArtifactFilename(
  artifact: string,
  version: string,
  packaging: string,
  descriptor?: string
): string {
  if (descriptor !== undefined) {
    return `${artifact}-${version}-${descriptor}.${packaging}`;
  }
  return `${artifact}-${version}.${packaging}`;
}
