export { splitFullName, getArtifactFilename, type ArtifactCoordinates } from "./naming";
