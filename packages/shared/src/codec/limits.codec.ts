import { parseAllDocuments, stringify } from 'yaml';
import type { ZodError } from 'zod';
import {
  LimitsDocumentSchema,
  type GlobalConfig,
  type LimitsDocument,
  type RequestConfig,
  type TenantConfig,
} from '../schemas/limits.schema';

/**
 * Single problem found while decoding a limits document
 */
export interface DecodeIssue {
  path: string;
  message: string;
}

export type DecodeResult =
  | { success: true; document: LimitsDocument }
  | { success: false; issues: DecodeIssue[] };

const formatZodIssues = (error: ZodError): DecodeIssue[] =>
  error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));

/**
 * Read the first YAML document in `source`. Any documents after it are ignored.
 */
const parseFirstDocument = (source: string): DecodeResult | { raw: unknown } => {
  const [first] = parseAllDocuments(source);
  if (!first) {
    return { raw: null };
  }

  const [syntaxError] = first.errors;
  if (syntaxError) {
    return { success: false, issues: [{ path: '', message: syntaxError.message }] };
  }
  try {
    return { raw: first.toJS() };
  } catch (error) {
    if (error instanceof Error) {
      return { success: false, issues: [{ path: '', message: error.message }] };
    }
    throw error;
  }
};

/**
 * Decode YAML text into a limits document.
 *
 * Unknown fields are dropped. Known fields with the wrong shape and text that
 * is not YAML are reported as issues instead of thrown.
 */
export const decodeLimitsDocument = (source: string): DecodeResult => {
  const parsed = parseFirstDocument(source);
  if (!('raw' in parsed)) {
    return parsed;
  }
  const { raw } = parsed;

  const result = LimitsDocumentSchema.safeParse(raw);
  if (!result.success) {
    return { success: false, issues: formatZodIssues(result.error) };
  }
  return { success: true, document: result.data };
};

/**
 * Copy only the fields that are present, so absent limits stay out of the output.
 */
const definedEntries = (value: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(value).filter(([, entry]) => entry !== undefined));

const requestToWire = (request: RequestConfig): Record<string, unknown> =>
  definedEntries({
    size_bytes_limit: request.size_bytes_limit,
    series_limit: request.series_limit,
    samples_limit: request.samples_limit,
  });

const tenantToWire = (tenant: TenantConfig): Record<string, unknown> =>
  definedEntries({
    request: tenant.request ? requestToWire(tenant.request) : undefined,
    head_series_limit: tenant.head_series_limit,
  });

const globalToWire = (global: GlobalConfig): Record<string, unknown> =>
  definedEntries({
    max_concurrency: global.max_concurrency,
    meta_monitoring_url: global.meta_monitoring_url,
    meta_monitoring_limit_query: global.meta_monitoring_limit_query,
  });

/**
 * Plain object in wire key order, with absent fields removed
 */
export const toWireObject = (document: LimitsDocument): Record<string, unknown> => {
  const { global, default: defaults, tenants } = document.write;
  const write: Record<string, unknown> = {
    global: globalToWire(global),
    default: tenantToWire(defaults),
  };

  if (tenants && Object.keys(tenants).length > 0) {
    const wireTenants: Record<string, unknown> = {};
    for (const [name, tenant] of Object.entries(tenants)) {
      wireTenants[name] = tenantToWire(tenant);
    }
    write['tenants'] = wireTenants;
  }

  return { write };
};

/**
 * Encode a limits document as YAML
 */
export const encodeLimitsDocument = (document: LimitsDocument): string =>
  stringify(toWireObject(document), { lineWidth: 0 });
