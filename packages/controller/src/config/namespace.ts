import { readFileSync } from 'fs'
import { DEFAULT_NAMESPACE, SERVICE_ACCOUNT_NAMESPACE_PATH } from '@receive-limits/shared'

export type NamespaceSource = 'flag' | 'env' | 'service-account' | 'kubeconfig' | 'default'

export interface ResolvedNamespace {
  namespace: string
  source: NamespaceSource
}

/**
 * Places a namespace can come from, in the order they are consulted
 */
export interface NamespaceSources {
  flag?: string
  env: NodeJS.ProcessEnv
  readServiceAccountNamespace: () => string | undefined
  kubeContextNamespace: () => string | undefined
}

/**
 * Namespace of the pod's service account, or undefined outside a pod
 */
export const readServiceAccountNamespace = (
  path: string = SERVICE_ACCOUNT_NAMESPACE_PATH
): string | undefined => {
  try {
    return readFileSync(path, 'utf8')
  } catch (error) {
    const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined
    if (code === 'ENOENT' || code === 'ENOTDIR' || code === 'EACCES') {
      return undefined
    }
    throw error
  }
}

const present = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Pick the namespace: --namespace, then NAMESPACE, then the service account
 * namespace file, then the current kubeconfig context, then `default`.
 */
export const resolveNamespace = (sources: NamespaceSources): ResolvedNamespace => {
  const fromFlag = present(sources.flag)
  if (fromFlag) {
    return { namespace: fromFlag, source: 'flag' }
  }

  const fromEnv = present(sources.env['NAMESPACE'])
  if (fromEnv) {
    return { namespace: fromEnv, source: 'env' }
  }

  const fromServiceAccount = present(sources.readServiceAccountNamespace())
  if (fromServiceAccount) {
    return { namespace: fromServiceAccount, source: 'service-account' }
  }

  const fromKubeconfig = present(sources.kubeContextNamespace())
  if (fromKubeconfig) {
    return { namespace: fromKubeconfig, source: 'kubeconfig' }
  }

  return { namespace: DEFAULT_NAMESPACE, source: 'default' }
}
