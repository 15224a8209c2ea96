import { z } from 'zod';

/**
 * Output delimiter: comma-separated for spreadsheets, tab-separated for
 * tools that choke on commas inside descriptions.
 */
export const ReportFormat = z.enum(['csv', 'tsv']);
export type ReportFormat = z.infer<typeof ReportFormat>;

/**
 * Column layout of the report.
 *
 *   - extended: CVE / CVSS columns plus the three research columns
 *   - legacy:   vulnerability id / issue id columns of the first report
 */
export const ReportLayout = z.enum(['extended', 'legacy']);
export type ReportLayout = z.infer<typeof ReportLayout>;

export const LogLevel = z.enum(['debug', 'info', 'warn', 'error']);
export type LogLevel = z.infer<typeof LogLevel>;

/** Platform connection shared by every command. */
export const ConnectionConfig = z.object({
  serverUrl: z
    .string()
    .url()
    .transform((url) => url.replace(/\/+$/, '')),
  accessToken: z.string().min(1, 'access token must not be empty'),
  /** Timeout for single-object lookups (watch, permissions, groups) */
  lookupTimeoutMs: z.number().int().positive().default(10_000),
});

export type ConnectionConfig = z.infer<typeof ConnectionConfig>;

export const ReportConfig = ConnectionConfig.extend({
  watchName: z.string().trim().min(1, 'watch name must not be empty'),
  pageSize: z.number().int().positive().default(100),
  format: ReportFormat.default('csv'),
  layout: ReportLayout.default('extended'),
  outputDir: z.string().min(1).default('.'),
  keepIntermediate: z.boolean().default(false),
  /** Timeout for violation page requests */
  requestTimeoutMs: z.number().int().positive().default(30_000),
  logLevel: LogLevel.default('info'),
});

/** Raw shape accepted by `parseReportConfig` (before defaults apply). */
export type ReportConfigInput = z.input<typeof ReportConfig>;
export type ReportConfig = z.infer<typeof ReportConfig>;

export type ParseConfigResult =
  | { success: true; config: ReportConfig }
  | { success: false; error: string; issues: z.ZodIssue[] };

/**
 * Validate a raw report configuration, applying defaults.
 */
export function parseReportConfig(raw: unknown): ParseConfigResult {
  const result = ReportConfig.safeParse(raw);
  if (!result.success) {
    return {
      success: false,
      error: `Invalid configuration: ${result.error.errors
        .map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
        .join(', ')}`,
      issues: result.error.errors,
    };
  }
  return { success: true, config: result.data };
}
