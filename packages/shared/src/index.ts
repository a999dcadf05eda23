/**
 * @receive-limits/shared
 * Limits document model, codec and constants for the receive limits controller
 */

export {
  RequestConfigSchema,
  TenantConfigSchema,
  GlobalConfigSchema,
  LimitsConfigSchema,
  LimitsDocumentSchema,
} from './schemas/limits.schema'

export type {
  RequestConfig,
  TenantConfig,
  GlobalConfig,
  LimitsConfig,
  LimitsDocument,
} from './schemas/limits.schema'

export {
  decodeLimitsDocument,
  encodeLimitsDocument,
  toWireObject,
} from './codec/limits.codec'

export type { DecodeIssue, DecodeResult } from './codec/limits.codec'

export {
  DEFAULT_LIMITS_KEY,
  DEFAULT_STATEFULSET_LABEL,
  DEFAULT_NAMESPACE,
  SERVICE_ACCOUNT_NAMESPACE_PATH,
} from './constants'
