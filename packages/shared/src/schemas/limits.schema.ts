import { z } from 'zod';

/**
 * An explicit YAML `null` on an optional field means the same as leaving it out.
 */
const nullAsAbsent = (value: unknown): unknown => (value === null ? undefined : value);

/**
 * Missing or `null` sections decode as an empty section so their defaults apply.
 */
const nullAsEmpty = (value: unknown): unknown => value ?? {};

/**
 * Optional integer limit. Absent stays absent and zero stays zero.
 * Integers outside the safe range are rejected: the parser has already rounded them.
 */
const optionalLimit = z.preprocess(
  nullAsAbsent,
  z
    .number({ invalid_type_error: 'Expected an integer' })
    .int('Expected an integer')
    .safe('Expected an integer within the safe range')
    .optional()
);

const text = z.preprocess(nullAsAbsent, z.string().default(''));

/**
 * Per-request limits applied by a receiver
 */
export const RequestConfigSchema = z.object({
  size_bytes_limit: optionalLimit,
  series_limit: optionalLimit,
  samples_limit: optionalLimit,
});
export type RequestConfig = z.infer<typeof RequestConfigSchema>;

/**
 * Limits for a single tenant, also used for the default tenant
 */
export const TenantConfigSchema = z.object({
  request: z.preprocess(nullAsAbsent, RequestConfigSchema.optional()),
  head_series_limit: optionalLimit,
});
export type TenantConfig = z.infer<typeof TenantConfigSchema>;

/**
 * Settings shared by every tenant. The limit query is handed to the
 * meta-monitoring system untouched.
 */
export const GlobalConfigSchema = z.object({
  max_concurrency: optionalLimit,
  meta_monitoring_url: text,
  meta_monitoring_limit_query: text,
});
export type GlobalConfig = z.infer<typeof GlobalConfigSchema>;

export const LimitsConfigSchema = z.object({
  global: z.preprocess(nullAsEmpty, GlobalConfigSchema),
  default: z.preprocess(nullAsEmpty, TenantConfigSchema),
  tenants: z.preprocess(
    nullAsAbsent,
    z.record(z.string(), z.preprocess(nullAsEmpty, TenantConfigSchema)).optional()
  ),
});
export type LimitsConfig = z.infer<typeof LimitsConfigSchema>;

/**
 * Root of the receive limits configuration file
 */
export const LimitsDocumentSchema = z.preprocess(
  nullAsEmpty,
  z.object({
    write: z.preprocess(nullAsEmpty, LimitsConfigSchema),
  })
);
export type LimitsDocument = z.infer<typeof LimitsDocumentSchema>;
