import { describe, test, expect } from "vitest";
import { z } from "zod";
import { formatIssues } from "./issues";

describe("formatIssues", () => {
  test("prefixes nested issues with their dotted path", () => {
    const schema = z.object({ results: z.array(z.object({ integration: z.boolean() })) });
    const parsed = schema.safeParse({ results: [{}] });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatIssues(parsed.error)).toEqual(["results.0.integration: Required"]);
    }
  });

  test("leaves root issues unprefixed", () => {
    const parsed = z.object({}).safeParse(null);

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatIssues(parsed.error)).toEqual(["Expected object, received null"]);
    }
  });
});
