import { describe, test, expect } from "vitest";
import { ClientConfigSchema, VersionSearchResponseSchema } from "./index";

describe("schemas", () => {
  describe("ClientConfigSchema", () => {
    test("applies defaults", () => {
      const result = ClientConfigSchema.parse({
        baseUrl: "https://repo.example.com/artifactory",
        repository: "libs-release-local",
      });

      expect(result).toEqual({
        layout: "maven",
        baseUrl: "https://repo.example.com/artifactory",
        repository: "libs-release-local",
        snapshot: false,
      });
    });

    test("strips trailing slashes from baseUrl", () => {
      const result = ClientConfigSchema.parse({
        baseUrl: "https://repo.example.com/artifactory//",
        repository: "libs-release",
      });

      expect(result.baseUrl).toBe("https://repo.example.com/artifactory");
    });

    test("accepts credentials and log level", () => {
      const result = ClientConfigSchema.parse({
        baseUrl: "https://repo.example.com/artifactory",
        repository: "libs-snapshot",
        snapshot: true,
        username: "deployer",
        password: "test-secret",
        logLevel: "debug",
      });

      expect(result.snapshot).toBe(true);
      expect(result.username).toBe("deployer");
      expect(result.password).toBe("test-secret");
      expect(result.logLevel).toBe("debug");
    });

    test("rejects relative baseUrl", () => {
      expect(() =>
        ClientConfigSchema.parse({ baseUrl: "artifactory", repository: "libs-release" })
      ).toThrow();
    });

    test("rejects empty repository", () => {
      expect(() =>
        ClientConfigSchema.parse({ baseUrl: "https://repo.example.com", repository: "  " })
      ).toThrow();
    });

    test("rejects unknown layout", () => {
      expect(() =>
        ClientConfigSchema.parse({
          layout: "pypi",
          baseUrl: "https://repo.example.com",
          repository: "pypi-local",
        })
      ).toThrow();
    });
  });

  describe("VersionSearchResponseSchema", () => {
    test("parses search results", () => {
      const result = VersionSearchResponseSchema.parse({
        results: [
          { version: "1.6.0", integration: false },
          { version: "1.7.0-SNAPSHOT", integration: true },
        ],
      });

      expect(result.results.map((r) => r.version)).toEqual(["1.6.0", "1.7.0-SNAPSHOT"]);
    });

    test("rejects entries without integration flag", () => {
      expect(() => VersionSearchResponseSchema.parse({ results: [{ version: "1.0.0" }] })).toThrow();
    });
  });
});
