import { describe, test, expect, vi } from "vitest";
import { buildIndex, PackageIndex } from "./specIndex";
import { EndpointSpecification, RemoteSpecification, fullNameOf } from "./packageSpec";
import type { RawSpec, SpecFetcher } from "./specIndex.types";
import { createDependency, Requirement } from "#/version";

const origin = { source: "rubygems", sourceUri: "https://gems.example.com/" };

const noFetcher: SpecFetcher = {
  fetchSpec: async () => {
    throw new Error("not expected");
  },
};

function build(entries: RawSpec[], specFetcher: SpecFetcher = noFetcher, selfPackageName = "bundler") {
  return buildIndex(entries, { ...origin, specFetcher, selfPackageName });
}

describe("specIndex", () => {
  describe("fullNameOf", () => {
    test("leaves the default platform out", () => {
      expect(fullNameOf("rack", "3.0.8", "ruby")).toBe("rack-3.0.8");
      expect(fullNameOf("rack", "3.0.8", "")).toBe("rack-3.0.8");
      expect(fullNameOf("nokogiri", "1.15.4", "x86_64-linux")).toBe("nokogiri-1.15.4-x86_64-linux");
    });
  });

  describe("buildIndex", () => {
    test("builds a spec from a raw tuple with its dependencies", async () => {
      const index = build([
        {
          name: "foo",
          version: "1.2.0",
          platform: "ruby",
          dependencies: [createDependency("bar", Requirement.parse(">= 1.0"))],
        },
      ]);

      const [spec] = index.search("foo");
      expect(spec?.name).toBe("foo");
      expect(spec?.version.toString()).toBe("1.2.0");
      const dependencies = (await spec?.dependencies()) ?? [];
      expect(dependencies).toHaveLength(1);
      expect(dependencies[0]?.name).toBe("bar");
      expect(dependencies[0]?.requirement.toString()).toBe(">= 1.0");
    });

    test("records source and safe location on every spec", () => {
      const index = build([{ name: "rack", version: "3.0.8", platform: "ruby", dependencies: [] }]);

      const [spec] = index.search("rack");
      expect(spec?.source).toBe("rubygems");
      expect(spec?.sourceUri).toBe("https://gems.example.com/");
    });

    test("leaves out the package manager itself", () => {
      const index = build([
        { name: "bundler", version: "2.5.0", platform: "ruby", dependencies: [] },
        { name: "bundler-audit", version: "0.9.1", platform: "ruby", dependencies: [] },
      ]);

      expect(index.names()).toEqual(["bundler-audit"]);
    });

    test("honors a configured self package name", () => {
      const index = build([{ name: "bundler", version: "2.5.0", platform: "ruby" }], noFetcher, "gem-tool");

      expect(index.names()).toEqual(["bundler"]);
    });

    test("marks entries without dependencies as resolved on demand", () => {
      const index = build([
        { name: "rack", version: "3.0.8", platform: "ruby" },
        { name: "rake", version: "13.0.6", platform: "ruby", dependencies: [] },
      ]);

      expect(index.search("rack")[0]).toBeInstanceOf(RemoteSpecification);
      expect(index.search("rack")[0]?.dependenciesResolved).toBe(false);
      expect(index.search("rake")[0]).toBeInstanceOf(EndpointSpecification);
      expect(index.search("rake")[0]?.dependenciesResolved).toBe(true);
    });

    test("returns a sealed index", () => {
      const index = build([]);

      expect(index.isSealed).toBe(true);
      expect(() =>
        index.add(new EndpointSpecification("rack", "1.0", "ruby", [], origin))
      ).toThrow("Cannot add rack-1.0: the index is sealed");
    });
  });

  describe("RemoteSpecification", () => {
    test("fetches dependencies once and keeps them", async () => {
      const fetchSpec = vi.fn<SpecFetcher["fetchSpec"]>().mockResolvedValue({
        name: "rack",
        version: "3.0.8",
        platform: "ruby",
        dependencies: [createDependency("webrick", Requirement.parse("~> 1.8"))],
      });
      const spec = new RemoteSpecification("rack", "3.0.8", "ruby", { fetchSpec }, origin);

      const first = await spec.dependencies();
      const second = await spec.dependencies();

      expect(first.map((dep) => dep.name)).toEqual(["webrick"]);
      expect(second).toBe(first);
      expect(fetchSpec).toHaveBeenCalledTimes(1);
      expect(fetchSpec).toHaveBeenCalledWith({ name: "rack", version: "3.0.8", platform: "ruby" });
      expect(spec.dependenciesResolved).toBe(true);
    });

    test("tries again after a failed fetch", async () => {
      const fetchSpec = vi
        .fn<SpecFetcher["fetchSpec"]>()
        .mockRejectedValueOnce(new Error("offline"))
        .mockResolvedValueOnce({ name: "rack", version: "3.0.8", platform: "ruby", dependencies: [] });
      const spec = new RemoteSpecification("rack", "3.0.8", "ruby", { fetchSpec }, origin);

      await expect(spec.dependencies()).rejects.toThrow("offline");
      await expect(spec.dependencies()).resolves.toEqual([]);
      expect(fetchSpec).toHaveBeenCalledTimes(2);
    });
  });

  describe("PackageIndex", () => {
    test("keeps one spec per name, version and platform", () => {
      const index = new PackageIndex()
        .add(new EndpointSpecification("nokogiri", "1.15.4", "ruby", [], origin))
        .add(new EndpointSpecification("nokogiri", "1.15.4", "x86_64-linux", [], origin))
        .add(new EndpointSpecification("nokogiri", "1.15.4", "ruby", [], { ...origin, source: "mirror" }));

      expect(index.size).toBe(2);
      expect(index.search("nokogiri").map((spec) => spec.fullName)).toEqual([
        "nokogiri-1.15.4",
        "nokogiri-1.15.4-x86_64-linux",
      ]);
      expect(index.search("nokogiri")[0]?.source).toBe("mirror");
    });

    test("orders variants by version", () => {
      const index = new PackageIndex()
        .add(new EndpointSpecification("rack", "3.0.10", "ruby", [], origin))
        .add(new EndpointSpecification("rack", "3.0.9", "ruby", [], origin))
        .add(new EndpointSpecification("rack", "3.1.0.beta1", "ruby", [], origin));

      expect(index.search("rack").map((spec) => spec.version.toString())).toEqual(["3.0.9", "3.0.10", "3.1.0.beta1"]);
    });

    test("iterates every spec", () => {
      const index = new PackageIndex()
        .add(new EndpointSpecification("a", "1", "ruby", [], origin))
        .add(new EndpointSpecification("b", "1", "ruby", [], origin));

      expect([...index].map((spec) => spec.fullName)).toEqual(["a-1", "b-1"]);
      expect(index.search("missing")).toEqual([]);
      expect(index.has("a")).toBe(true);
    });
  });
});
