/**
 * Key of the limits file inside both the source and the generated ConfigMap
 * @default config.yaml
 */
export const DEFAULT_LIMITS_KEY = 'config.yaml'

/**
 * Label selector matching the receiver StatefulSets whose ready replicas are counted
 */
export const DEFAULT_STATEFULSET_LABEL = 'controller.limits.thanos.io=thanos-limits-controller'

/**
 * Namespace used when nothing else names one
 */
export const DEFAULT_NAMESPACE = 'default'

/**
 * Namespace file mounted into every pod with a service account
 */
export const SERVICE_ACCOUNT_NAMESPACE_PATH = '/var/run/secrets/kubernetes.io/serviceaccount/namespace'
