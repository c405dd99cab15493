import { z } from "zod";
import { isValidVersion } from "#/version";

// Gem version string as published
export const VersionStringSchema = z.string().refine(isValidVersion, {
  message: "Invalid gem version (e.g., 1.0, 2.1.0, 3.0.0.rc1)",
});

// Gem::Version after toPlain: marshal_dump of [version]
export const GemVersionSchema = z.union([
  VersionStringSchema,
  z
    .object({
      "@class": z.literal("Gem::Version"),
      "@data": z.tuple([VersionStringSchema]).rest(z.unknown()),
    })
    .transform((v) => v["@data"][0]),
]);

// Dependencies of a dependency API record: [[name, "req1, req2"], ...] or { name: "req1, req2" }
export const DependencyListSchema = z
  .union([z.array(z.tuple([z.string(), z.string()])), z.record(z.string(), z.string())])
  .transform((deps) => (Array.isArray(deps) ? deps : Object.entries(deps)));

// One record of GET api/v1/dependencies
export const DependencyApiRecordSchema = z.object({
  name: z.string().min(1),
  number: VersionStringSchema,
  platform: z.string().nullish(),
  dependencies: DependencyListSchema.default([]),
});
export type DependencyApiRecord = z.infer<typeof DependencyApiRecordSchema>;

export const DependencyApiResponseSchema = z.array(DependencyApiRecordSchema);

// One entry of specs.4.8 / prerelease_specs.4.8: [name, Gem::Version, platform]
export const FullIndexEntrySchema = z
  .tuple([z.string().min(1), GemVersionSchema, z.string().nullable()])
  .rest(z.unknown());

export const FullIndexSchema = z.array(FullIndexEntrySchema);

// Gem::Platform object, or the platform string
export const PlatformSchema = z.union([
  z.string(),
  z
    .object({
      "@class": z.literal("Gem::Platform"),
      cpu: z.string().nullish(),
      os: z.string().nullish(),
      version: z.string().nullish(),
    })
    .transform((p) => [p.cpu, p.os, p.version].filter((part): part is string => !!part).join("-")),
]);

// Gem::Requirement: marshal_dump of [[[op, version], ...]], or a plain object with @requirements
const ConstraintPairSchema = z.tuple([z.string(), GemVersionSchema]);
export const RequirementDumpSchema = z.union([
  z
    .object({
      "@class": z.literal("Gem::Requirement"),
      "@data": z.tuple([z.array(ConstraintPairSchema)]),
    })
    .transform((r) => r["@data"][0]),
  z
    .object({
      "@class": z.literal("Gem::Requirement"),
      requirements: z.array(ConstraintPairSchema),
    })
    .transform((r) => r.requirements),
]);

export const DependencyDumpSchema = z.object({
  "@class": z.literal("Gem::Dependency"),
  name: z.string(),
  requirement: RequirementDumpSchema,
  type: z.enum(["runtime", "development"]).default("runtime"),
});

// Fields of a Gem::Specification _dump that make up a package tuple
export const SpecificationDumpSchema = z
  .array(z.unknown())
  .min(10)
  .transform((fields, ctx) => {
    const parsed = z
      .object({
        name: z.string().min(1),
        version: GemVersionSchema,
        originalPlatform: PlatformSchema.nullish(),
        dependencies: z.array(DependencyDumpSchema).default([]),
        newPlatform: PlatformSchema.nullish(),
      })
      .safeParse({
        name: fields[2],
        version: fields[3],
        originalPlatform: fields[8],
        dependencies: fields[9],
        newPlatform: fields[16],
      });
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: issue.message, path: issue.path });
      }
      return z.NEVER;
    }
    return parsed.data;
  });
export type SpecificationDump = z.infer<typeof SpecificationDumpSchema>;

// Settings file (.bundle/config): flat map of BUNDLE_* keys
export const SettingsFileSchema = z
  .record(z.string(), z.union([z.string(), z.number(), z.boolean()]))
  .nullable()
  .transform((settings) =>
    Object.fromEntries(Object.entries(settings ?? {}).map(([key, value]) => [key, String(value)]))
  );
export type SettingsFile = z.infer<typeof SettingsFileSchema>;

const BooleanSettingSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(["true", "false", "1", "0", "yes", "no"]))
  .transform((value) => value === "true" || value === "1" || value === "yes");

const PositiveIntSettingSchema = z.coerce.number().int().positive();

// Fetcher settings as read from a SettingsSource (all values are strings)
export const FetcherSettingsSchema = z.object({
  ssl_verify_mode: z.coerce.number().int().min(0).max(1).optional(),
  ssl_client_cert: z.string().min(1).optional(),
  ssl_ca_cert: z.string().min(1).optional(),
  disable_endpoint: BooleanSettingSchema.optional(),
  redirect_limit: PositiveIntSettingSchema.optional(),
  timeout: PositiveIntSettingSchema.optional(),
  retry: z.coerce.number().int().min(0).optional(),
  user_agent: z.string().min(1).optional(),
});
export type FetcherSettings = z.infer<typeof FetcherSettingsSchema>;
