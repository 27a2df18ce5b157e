import { describe, it, expect } from "vitest";
import { redactPayload, redactText } from "./redact.js";

describe("redactText", () => {
  it("scrubs google and openai style keys", () => {
    const google = "AIza" + "a".repeat(35);
    const openai = "sk-proj-" + "b".repeat(24);
    expect(redactText(`key=${google} other=${openai}`)).toBe("key=[REDACTED] other=[REDACTED]");
  });

  it("leaves ordinary text alone", () => {
    expect(redactText("Hey Blair, let's keep moving!")).toBe("Hey Blair, let's keep moving!");
  });
});

describe("redactPayload", () => {
  it("redacts sensitive keys and nested values", () => {
    const result = redactPayload({
      api_key: "test-secret",
      nested: { list: ["plain", "Bearer " + "c".repeat(24)] },
      count: 3,
    });
    expect(result).toEqual({
      api_key: "[REDACTED]",
      nested: { list: ["plain", "[REDACTED]"] },
      count: 3,
    });
  });

  it("passes through null and primitives", () => {
    expect(redactPayload(null)).toBeNull();
    expect(redactPayload(7)).toBe(7);
  });
});
