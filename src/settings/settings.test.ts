import { describe, test, expect } from "vitest";
import {
  buildUserAgent,
  createSettingsSource,
  dottedKeyFor,
  loadSettingsFile,
  readFetcherConfig,
  settingsFromEnv,
  settingsKeyFor,
} from "./settings";
import { createMockFileSystem } from "#/test-utils/mocks";

describe("settings", () => {
  describe("key normalization", () => {
    test("maps dotted keys to stored keys", () => {
      expect(settingsKeyFor("ssl_verify_mode")).toBe("BUNDLE_SSL_VERIFY_MODE");
      expect(settingsKeyFor("gems.example.com")).toBe("BUNDLE_GEMS__EXAMPLE__COM");
      expect(settingsKeyFor("mirror.https://rubygems.org/")).toBe("BUNDLE_MIRROR__HTTPS://RUBYGEMS__ORG/");
    });

    test("maps stored keys back", () => {
      expect(dottedKeyFor("BUNDLE_GEMS__EXAMPLE__COM")).toBe("gems.example.com");
    });
  });

  describe("createSettingsSource", () => {
    test("earlier layers win", () => {
      const settings = createSettingsSource({ BUNDLE_RETRY: "1" }, { BUNDLE_RETRY: "5", BUNDLE_TIMEOUT: "30" });

      expect(settings.get("retry")).toBe("1");
      expect(settings.get("timeout")).toBe("30");
      expect(settings.get("missing")).toBeUndefined();
    });

    test("lists every set key once, sorted", () => {
      const settings = createSettingsSource({ BUNDLE_RETRY: "1" }, { BUNDLE_RETRY: "5", BUNDLE_GEMS__EXAMPLE__COM: "u:p" });

      expect(settings.all()).toEqual(["gems.example.com", "retry"]);
    });
  });

  describe("settingsFromEnv", () => {
    test("keeps only BUNDLE_ variables", () => {
      expect(settingsFromEnv({ BUNDLE_TIMEOUT: "5", HOME: "/root", BUNDLE_EMPTY: undefined })).toEqual({
        BUNDLE_TIMEOUT: "5",
      });
    });
  });

  describe("loadSettingsFile", () => {
    test("parses a YAML settings file", () => {
      const fs = createMockFileSystem({
        "/project/.bundle/config": 'BUNDLE_RETRY: 2\nBUNDLE_SSL_CA_CERT: "/etc/ca.pem"\n',
      });

      const result = loadSettingsFile(fs, "/project/.bundle/config");

      expect(result).toEqual({
        success: true,
        data: { BUNDLE_RETRY: "2", BUNDLE_SSL_CA_CERT: "/etc/ca.pem" },
      });
    });

    test("returns an empty layer for a missing file", () => {
      expect(loadSettingsFile(createMockFileSystem(), "/nope")).toEqual({ success: true, data: {} });
    });

    test("reports invalid YAML with the file path", () => {
      const fs = createMockFileSystem({ "/cfg": "BUNDLE_RETRY: [1,\n" });

      const result = loadSettingsFile(fs, "/cfg");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.message).toBe("Invalid YAML syntax in /cfg");
      }
    });
  });

  describe("buildUserAgent", () => {
    test("includes tool, runtime, command, options and token", () => {
      const agent = buildUserAgent({
        toolName: "gem-source-fetcher",
        toolVersion: "0.4.0",
        command: "install",
        options: ["retry", "timeout"],
        sessionToken: "0123456789abcdef",
        extra: "ci/1",
      });

      expect(agent).toBe(
        `gem-source-fetcher/0.4.0 node/${process.version} (${process.platform}-${process.arch}) ` +
          "command/install options/retry,timeout 0123456789abcdef ci/1"
      );
    });

    test("generates a 16 hex character token", () => {
      const agent = buildUserAgent({ toolName: "t", toolVersion: "1", options: [] });

      expect(agent).toMatch(/ [0-9a-f]{16}$/);
    });
  });

  describe("readFetcherConfig", () => {
    test("uses defaults when nothing is set", () => {
      const result = readFetcherConfig(createSettingsSource(), { sessionToken: "0000000000000000" });

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.redirectLimit).toBe(5);
        expect(result.data.timeoutMs).toBe(10_000);
        expect(result.data.maxAttempts).toBe(3);
        expect(result.data.apiRequestLimit).toBe(100);
        expect(result.data.disableEndpoint).toBe(false);
        expect(result.data.tls).toEqual({ verifyMode: undefined, caCert: undefined, clientCert: undefined });
        expect(result.data.userAgent).toContain("command/none options/ 0000000000000000");
      }
    });

    test("records an explicit peer verify mode", () => {
      const result = readFetcherConfig(createSettingsSource({ BUNDLE_SSL_VERIFY_MODE: "1" }));

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.tls.verifyMode).toBe("peer");
      }
    });

    test("reads TLS, retry and endpoint settings", () => {
      const settings = createSettingsSource({
        BUNDLE_SSL_VERIFY_MODE: "0",
        BUNDLE_SSL_CA_CERT: "/etc/certs",
        BUNDLE_SSL_CLIENT_CERT: "/etc/client.pem",
        BUNDLE_DISABLE_ENDPOINT: "true",
        BUNDLE_RETRY: "0",
        BUNDLE_TIMEOUT: "30",
      });

      const result = readFetcherConfig(settings);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.tls).toEqual({
          verifyMode: "none",
          caCert: "/etc/certs",
          clientCert: "/etc/client.pem",
        });
        expect(result.data.disableEndpoint).toBe(true);
        expect(result.data.maxAttempts).toBe(1);
        expect(result.data.timeoutMs).toBe(30_000);
      }
    });

    test("applies overrides last", () => {
      const result = readFetcherConfig(createSettingsSource({ BUNDLE_REDIRECT_LIMIT: "2" }), {
        overrides: { redirectLimit: 9, specCacheDirs: ["/cache"] },
      });

      expect(result.success && result.data.redirectLimit).toBe(9);
      expect(result.success && result.data.specCacheDirs).toEqual(["/cache"]);
    });

    test("reports invalid values by setting name", () => {
      const result = readFetcherConfig(createSettingsSource({ BUNDLE_REDIRECT_LIMIT: "lots" }));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("settings");
        expect(result.error.details?.[0]).toMatch(/^redirect_limit: /);
      }
    });
  });
});
