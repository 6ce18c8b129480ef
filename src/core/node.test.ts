import { describe, test, expect } from "vitest";
import { createEnvCredentialProvider } from "./node";
import { createLogger } from "./logger";

describe("createEnvCredentialProvider", () => {
  test("reads ARTIFACTORY_USERNAME and ARTIFACTORY_PASSWORD", () => {
    const provider = createEnvCredentialProvider({
      ARTIFACTORY_USERNAME: "env-user",
      ARTIFACTORY_PASSWORD: "env-pass",
    });

    expect(provider.getCredentials("https://x/artifactory")).toEqual({
      username: "env-user",
      password: "env-pass",
    });
  });

  test("treats empty variables as unset", () => {
    const provider = createEnvCredentialProvider({ ARTIFACTORY_USERNAME: "" });

    const credentials = provider.getCredentials("https://x/artifactory");

    expect(credentials.username).toBeUndefined();
    expect(credentials.password).toBeUndefined();
  });
});

describe("createLogger", () => {
  test("is silent by default", () => {
    expect(createLogger().level).toBe("silent");
  });

  test("uses the requested level", () => {
    expect(createLogger({ level: "debug" }).level).toBe("debug");
  });
});
