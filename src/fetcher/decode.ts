/**
 * Payload decoding
 *
 * Marshal payloads from the three registry endpoints, validated into
 * RawSpec entries. Every decoding problem becomes a MalformedSpec failure
 * naming the safe location.
 */

import { gunzipSync, inflateSync } from "zlib";
import type { z } from "zod";
import { loadMarshal, toPlain, MarshalUserDump, type PlainValue } from "#/marshal";
import { formatZodIssues } from "#/friendly-errors";
import { malformedResponse, malformedSpec } from "#/errors";
import { DependencyApiResponseSchema, FullIndexSchema, SpecificationDumpSchema } from "#/schemas";
import { createDependency, Requirement, RequirementParseError, type Dependency } from "#/version";
import type { RawSpec } from "#/specIndex";
import { fullNameOf } from "#/specIndex";
import { DEFAULT_PLATFORM } from "#/constants";

const SPECIFICATION_CLASS = "Gem::Specification";

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodePlain(body: Buffer, location: string): PlainValue {
  try {
    return toPlain(loadMarshal(body));
  } catch (error) {
    throw malformedResponse(location, describe(error), error);
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, value: PlainValue, location: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw malformedResponse(location, formatZodIssues(parsed.error).join("; "), parsed.error);
  }
  return parsed.data;
}

/**
 * Parse a dependency list into requirements. An ill-formed requirement
 * fails the whole package rather than being dropped.
 */
function parseDependencies(
  pairs: ReadonlyArray<readonly [string, string]>,
  packageLabel: string,
  location: string
): Dependency[] {
  return pairs.map(([name, requirement]) => {
    try {
      return createDependency(name, Requirement.parseList(requirement));
    } catch (error) {
      if (error instanceof RequirementParseError) {
        throw malformedSpec(location, packageLabel, error.message, error);
      }
      throw error;
    }
  });
}

/**
 * GET api/v1/dependencies body → entries with dependencies
 */
export function decodeDependencyApi(body: Buffer, location: string): RawSpec[] {
  const records = validate(DependencyApiResponseSchema, decodePlain(body, location), location);

  return records.map((record) => {
    const platform = record.platform || DEFAULT_PLATFORM;
    const label = fullNameOf(record.name, record.number, platform);
    return {
      name: record.name,
      version: record.number,
      platform,
      dependencies: parseDependencies(record.dependencies, label, location),
    };
  });
}

/**
 * specs.4.8.gz / prerelease_specs.4.8.gz body → entries without dependencies
 */
export function decodeFullIndex(body: Buffer, location: string): RawSpec[] {
  let inflated: Buffer;
  try {
    inflated = gunzipSync(body);
  } catch (error) {
    throw malformedResponse(location, describe(error), error);
  }

  const entries = validate(FullIndexSchema, decodePlain(inflated, location), location);
  return entries.map(([name, version, platform]) => ({
    name,
    version,
    platform: platform || DEFAULT_PLATFORM,
  }));
}

/**
 * quick/Marshal.4.8 gemspec body → one entry with its dependencies
 */
export function decodeGemspec(body: Buffer, location: string, packageLabel: string): RawSpec {
  const invalid = (cause: unknown) => malformedSpec(location, packageLabel, "contained invalid data", cause);

  let fields: PlainValue;
  try {
    const outer = loadMarshal(inflateSync(body));
    if (!(outer instanceof MarshalUserDump) || outer.className !== SPECIFICATION_CLASS) {
      throw new TypeError(`expected a ${SPECIFICATION_CLASS} dump`);
    }
    fields = toPlain(loadMarshal(outer.bytes));
  } catch (error) {
    throw invalid(error);
  }

  const parsed = SpecificationDumpSchema.safeParse(fields);
  if (!parsed.success) {
    throw invalid(parsed.error);
  }

  const spec = parsed.data;
  const dependencies = spec.dependencies.map((dependency) => {
    try {
      const requirement = Requirement.parse(...dependency.requirement.map(([op, version]) => `${op} ${version}`));
      return createDependency(dependency.name, requirement, dependency.type);
    } catch (error) {
      if (error instanceof RequirementParseError) {
        throw malformedSpec(location, packageLabel, error.message, error);
      }
      throw error;
    }
  });

  return {
    name: spec.name,
    version: spec.version,
    platform: spec.newPlatform || spec.originalPlatform || DEFAULT_PLATFORM,
    dependencies,
  };
}
