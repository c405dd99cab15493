import { describe, test, expect } from "vitest";
import {
  GemVersion,
  isValidVersion,
  compareVersions,
} from "./version";

describe("version", () => {
  describe("isValidVersion", () => {
    test("accepts gem versions", () => {
      expect(isValidVersion("1.0.0")).toBe(true);
      expect(isValidVersion("1.2")).toBe(true);
      expect(isValidVersion("3.1.4.1")).toBe(true);
      expect(isValidVersion(" 2.0 ")).toBe(true);
    });

    test("accepts prerelease versions", () => {
      expect(isValidVersion("1.0.0.rc1")).toBe(true);
      expect(isValidVersion("1.0.0-beta.1")).toBe(true);
    });

    test("rejects invalid strings", () => {
      expect(isValidVersion("banana")).toBe(false);
      expect(isValidVersion("v1.0.0")).toBe(false);
      expect(isValidVersion("1..0")).toBe(false);
      expect(isValidVersion("1.0 2.0")).toBe(false);
    });
  });

  describe("GemVersion", () => {
    test("splits numeric and string segments", () => {
      expect(new GemVersion("1.0.0.rc1").segments).toEqual([1n, 0n, 0n, "rc", 1n]);
    });

    test("treats blank as 0", () => {
      expect(new GemVersion("").version).toBe("0");
    });

    test("detects prereleases", () => {
      expect(new GemVersion("1.0.0.beta").isPrerelease).toBe(true);
      expect(new GemVersion("1.0.0").isPrerelease).toBe(false);
    });

    test("release drops prerelease segments", () => {
      expect(new GemVersion("2.1.0.rc2").release().toString()).toBe("2.1.0");
    });

    test("bump increments the next-to-last segment", () => {
      expect(new GemVersion("1.2.3").bump().toString()).toBe("1.3");
      expect(new GemVersion("5").bump().toString()).toBe("6");
      expect(new GemVersion("1.2.rc1").bump().toString()).toBe("2");
    });

    test("throws on malformed input", () => {
      expect(() => new GemVersion("not-a-version")).toThrow(/Malformed version/);
    });
  });

  describe("compareVersions", () => {
    test("orders numerically, not lexically", () => {
      expect(compareVersions("1.10", "1.9")).toBe(1);
      expect(compareVersions("1.0.0", "2.0.0")).toBe(-1);
    });

    test("ignores trailing zeros", () => {
      expect(compareVersions("1.0", "1.0.0")).toBe(0);
    });

    test("prerelease is less than release", () => {
      expect(compareVersions("1.0.0.rc1", "1.0.0")).toBe(-1);
      expect(compareVersions("1.0.0-alpha", "1.0.0")).toBe(-1);
    });

    test("compares prerelease tags", () => {
      expect(compareVersions("1.0.0.alpha", "1.0.0.beta")).toBe(-1);
      expect(compareVersions("1.0.0.rc2", "1.0.0.rc10")).toBe(-1);
    });

    test("orders segments beyond the safe integer range exactly", () => {
      expect(compareVersions("20230101120000123456", "20230101120000123457")).toBe(-1);
      expect(compareVersions("1.20230101120000123456", "1.20230101120000123456")).toBe(0);
    });
  });
});
