import { z } from 'zod';

/**
 * Response schemas for the Xray, Artifactory and Access REST APIs.
 *
 * The platform omits fields freely (and sometimes sends `null` or the wrong
 * type), so every field falls back instead of failing the whole response.
 * Unknown fields are kept: watches are read, modified and written back.
 */

// ---------------------------------------------------------------------------
// Lenient field helpers
// ---------------------------------------------------------------------------

/** A scalar rendered as text; anything else becomes `null`. */
const optionalText = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)))
  .catch(null);

/** A list of strings; non-string entries are dropped. */
const textList = z
  .array(z.unknown())
  .nullish()
  .transform((items) =>
    (items ?? []).filter((item): item is string => typeof item === 'string'),
  )
  .catch([]);

/** A list of objects; entries that do not match the schema are dropped. */
function objectList<T extends z.ZodTypeAny>(schema: T) {
  return z
    .array(z.unknown())
    .nullish()
    .transform((items) =>
      (items ?? []).flatMap((item): z.infer<T>[] => {
        const parsed = schema.safeParse(item);
        return parsed.success ? [parsed.data] : [];
      }),
    )
    .catch([]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Violations
// ---------------------------------------------------------------------------

export const ViolationProperty = z
  .object({
    cve: optionalText,
    cvss_v2: optionalText,
    cvss_v3: optionalText,
  })
  .passthrough();

export const ApplicabilityDetail = z
  .object({
    component_id: optionalText,
    vulnerability_id: optionalText,
    result: optionalText,
  })
  .passthrough();

export const ExtendedInformation = z
  .object({
    short_description: optionalText,
    full_description: optionalText,
    remediation: optionalText,
  })
  .passthrough();

export const XrayViolation = z
  .object({
    type: optionalText,
    watch_name: optionalText,
    severity: optionalText,
    description: optionalText,
    issue_id: optionalText,
    created: optionalText,
    violation_details_url: optionalText,
    impacted_artifacts: textList,
    infected_components: textList,
    infected_versions: textList,
    fix_versions: textList,
    properties: objectList(ViolationProperty),
    applicability_details: objectList(ApplicabilityDetail),
    extended_information: z
      .unknown()
      .transform((value) => {
        if (!isRecord(value) || Object.keys(value).length === 0) return null;
        const parsed = ExtendedInformation.safeParse(value);
        return parsed.success ? parsed.data : null;
      }),
  })
  .passthrough();

export type XrayViolation = z.infer<typeof XrayViolation>;

export const ViolationsPage = z
  .object({
    total_violations: z.coerce.number().int().nonnegative().catch(0),
    violations: objectList(XrayViolation),
  })
  .passthrough();

export type ViolationsPage = z.infer<typeof ViolationsPage>;

// ---------------------------------------------------------------------------
// Watches
// ---------------------------------------------------------------------------

/**
 * A string field of an object that is written back as-is: absent stays
 * absent, `null` is kept, anything else is dropped.
 */
const keptString = z.string().nullish().catch(undefined);

export const WatchResource = z
  .object({
    type: keptString,
    bin_mgr_id: keptString,
    name: keptString,
    repo_type: keptString,
  })
  .passthrough();

export type WatchResource = z.infer<typeof WatchResource>;

export const XrayWatch = z
  .object({
    general_data: z
      .object({
        name: keptString,
        description: keptString,
        active: z.boolean().nullish().catch(undefined),
      })
      .passthrough()
      .nullish(),
    project_resources: z
      .object({
        resources: z.array(WatchResource).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type XrayWatch = z.infer<typeof XrayWatch>;

// ---------------------------------------------------------------------------
// Artifactory / Access
// ---------------------------------------------------------------------------

export const RepositoryPermissions = z
  .object({
    repo: optionalText,
    principals: z
      .object({
        users: z.record(z.unknown()).catch({}),
        groups: z.record(z.unknown()).catch({}),
      })
      .catch({ users: {}, groups: {} }),
  })
  .passthrough();

export type RepositoryPermissions = z.infer<typeof RepositoryPermissions>;

export const AccessGroup = z
  .object({
    name: optionalText,
    description: optionalText,
    members: textList,
  })
  .passthrough();

export type AccessGroup = z.infer<typeof AccessGroup>;

export const RepositoryProperties = z
  .object({
    uri: optionalText,
    properties: z.record(textList).catch({}),
  })
  .passthrough();

export type RepositoryProperties = z.infer<typeof RepositoryProperties>;

export const RepositorySummary = z
  .object({
    key: z.string(),
    type: z.string().optional(),
    packageType: z.string().optional(),
    url: z.string().optional(),
  })
  .passthrough();

export type RepositorySummary = z.infer<typeof RepositorySummary>;

export const RepositoryList = objectList(RepositorySummary);

export const RepositoryDetails = z
  .object({
    key: z.string(),
    rclass: optionalText,
    packageType: optionalText,
  })
  .passthrough();

export type RepositoryDetails = z.infer<typeof RepositoryDetails>;
