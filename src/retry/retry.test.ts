import { describe, test, expect, vi } from "vitest";
import { attempt } from "./retry";
import {
  authenticationRequired,
  badAuthentication,
  certificateFailure,
  httpError,
} from "#/errors";
import { createMockLogger } from "#/test-utils/mocks";

describe("attempt", () => {
  test("returns the first success without retrying", async () => {
    const operation = vi.fn(async () => "specs");

    await expect(attempt(operation, { delayMs: 0 })).resolves.toBe("specs");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("calls an always-unauthenticated operation exactly once", async () => {
    const failure = authenticationRequired("gems.example.com");
    const operation = vi.fn(async () => {
      throw failure;
    });

    await expect(attempt(operation, { maxAttempts: 3, delayMs: 0 })).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("does not retry bad credentials", async () => {
    const operation = vi.fn(async () => {
      throw badAuthentication("https://gems.example.com/");
    });

    await expect(attempt(operation, { delayMs: 0 })).rejects.toMatchObject({ kind: "BadAuthentication" });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test.each([1, 2, 3])("succeeds on call %i of 3 after generic HTTP errors", async (succeedOn) => {
    let calls = 0;
    const operation = vi.fn(async () => {
      calls++;
      if (calls < succeedOn) {
        throw httpError("https://gems.example.com/", 502, "Bad Gateway", "");
      }
      return "specs";
    });

    await expect(attempt(operation, { maxAttempts: 3, delayMs: 0 })).resolves.toBe("specs");
    expect(operation).toHaveBeenCalledTimes(succeedOn);
  });

  test("propagates the final failure after maxAttempts calls", async () => {
    const operation = vi.fn(async () => {
      throw httpError("https://gems.example.com/", 503, "Service Unavailable", "");
    });

    await expect(attempt(operation, { maxAttempts: 3, delayMs: 0 })).rejects.toMatchObject({
      kind: "HTTPError",
      status: 503,
    });
    expect(operation).toHaveBeenCalledTimes(3);
  });

  test("honors a custom abort list", async () => {
    const operation = vi.fn(async () => {
      throw certificateFailure("https://gems.example.com/");
    });

    await expect(
      attempt(operation, { abortOn: ["CertificateFailure"], maxAttempts: 3, delayMs: 0 })
    ).rejects.toMatchObject({ kind: "CertificateFailure" });
    expect(operation).toHaveBeenCalledTimes(1);
  });

  test("logs each retry with its label", async () => {
    const logger = createMockLogger();
    let calls = 0;

    await attempt(
      async () => {
        calls++;
        if (calls === 1) throw httpError("https://gems.example.com/", 500, "Internal Server Error", "");
        return calls;
      },
      { maxAttempts: 2, delayMs: 0, label: "dependency api", logger }
    );

    expect(logger.lines).toEqual([
      "debug: Retrying dependency api (attempt 2 of 2): HTTP 500 Internal Server Error while fetching https://gems.example.com/",
    ]);
  });
});
