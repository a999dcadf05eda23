import {
  AppsV1Api,
  CoreV1Api,
  HttpError,
  KubeConfig,
  type V1ConfigMap,
  type V1StatefulSetList,
} from '@kubernetes/client-node';
import {
  AlreadyExistsError,
  ConflictError,
  ConnectivityError,
  NotFoundError,
  type ErrorContext,
} from '../errors/controller.errors';
import { silentLogger, type Logger } from '../utils/logger';
import type {
  Artifact,
  ArtifactInput,
  ArtifactUpdate,
  ObjectStore,
  WorkloadGroup,
} from './object-store';

/**
 * The StatefulSet calls the store needs. AppsV1Api satisfies it.
 */
export interface StatefulSetApi {
  listNamespacedStatefulSet(
    namespace: string,
    pretty?: string,
    allowWatchBookmarks?: boolean,
    _continue?: string,
    fieldSelector?: string,
    labelSelector?: string
  ): Promise<{ body: V1StatefulSetList }>;
}

/**
 * The ConfigMap calls the store needs. CoreV1Api satisfies it.
 */
export interface ConfigMapApi {
  readNamespacedConfigMap(name: string, namespace: string): Promise<{ body: V1ConfigMap }>;
  createNamespacedConfigMap(namespace: string, body: V1ConfigMap): Promise<{ body: V1ConfigMap }>;
  replaceNamespacedConfigMap(
    name: string,
    namespace: string,
    body: V1ConfigMap
  ): Promise<{ body: V1ConfigMap }>;
}

type Verb = 'list' | 'get' | 'create' | 'update';

const readMessage = (error: unknown): string => {
  if (error instanceof HttpError) {
    const body: unknown = error.body;
    if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
      return body.message;
    }
  }
  return error instanceof Error ? error.message : String(error);
};

/**
 * Translate a client failure into the controller error taxonomy. A 409 on
 * create means the name is taken; on update it means the resourceVersion is stale.
 */
export const mapKubeError = (error: unknown, verb: Verb, context: ErrorContext): Error => {
  const message = readMessage(error);
  const statusCode = error instanceof HttpError ? error.statusCode : undefined;

  if (statusCode === 404) {
    return new NotFoundError(message, context, { cause: error });
  }
  if (statusCode === 409) {
    if (verb === 'create') {
      return new AlreadyExistsError(message, context, { cause: error });
    }
    return new ConflictError(message, context, { cause: error });
  }
  return new ConnectivityError(
    `Kubernetes ${verb} request failed: ${message}`,
    statusCode,
    context,
    { cause: error }
  );
};

const toArtifact = (configMap: V1ConfigMap, namespace: string): Artifact => ({
  name: configMap.metadata?.name ?? '',
  namespace: configMap.metadata?.namespace ?? namespace,
  data: { ...(configMap.data ?? {}) },
  resourceVersion: configMap.metadata?.resourceVersion,
});

/**
 * Object store backed by the Kubernetes API: StatefulSets are the workload
 * groups and ConfigMaps are the artifacts.
 */
export class KubeObjectStore implements ObjectStore {
  constructor(
    private readonly statefulSets: StatefulSetApi,
    private readonly configMaps: ConfigMapApi,
    private readonly logger: Logger = silentLogger
  ) {}

  async listWorkloadGroups(namespace: string, labelSelector: string): Promise<WorkloadGroup[]> {
    try {
      this.logger.debug({ namespace, labelSelector }, 'Listing StatefulSets');

      const { body } = await this.statefulSets.listNamespacedStatefulSet(
        namespace,
        undefined,
        undefined,
        undefined,
        undefined,
        labelSelector
      );

      return body.items.map((statefulSet) => ({
        name: statefulSet.metadata?.name ?? '',
        desiredReplicas: statefulSet.spec?.replicas ?? 0,
        readyReplicas: statefulSet.status?.readyReplicas ?? 0,
      }));
    } catch (error) {
      throw mapKubeError(error, 'list', { namespace, labelSelector });
    }
  }

  async getArtifact(namespace: string, name: string): Promise<Artifact> {
    try {
      const { body } = await this.configMaps.readNamespacedConfigMap(name, namespace);
      return toArtifact(body, namespace);
    } catch (error) {
      throw mapKubeError(error, 'get', { namespace, name });
    }
  }

  async createArtifact(namespace: string, artifact: ArtifactInput): Promise<Artifact> {
    try {
      const { body } = await this.configMaps.createNamespacedConfigMap(namespace, {
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: { name: artifact.name, namespace },
        data: { ...artifact.data },
      });
      return toArtifact(body, namespace);
    } catch (error) {
      throw mapKubeError(error, 'create', { namespace, name: artifact.name });
    }
  }

  async updateArtifact(namespace: string, artifact: ArtifactUpdate): Promise<Artifact> {
    try {
      const { body } = await this.configMaps.replaceNamespacedConfigMap(artifact.name, namespace, {
        apiVersion: 'v1',
        kind: 'ConfigMap',
        metadata: {
          name: artifact.name,
          namespace,
          resourceVersion: artifact.resourceVersion,
        },
        data: { ...artifact.data },
      });
      return toArtifact(body, namespace);
    } catch (error) {
      throw mapKubeError(error, 'update', {
        namespace,
        name: artifact.name,
        resourceVersion: artifact.resourceVersion,
      });
    }
  }
}

/**
 * Load cluster credentials: the pod's service account when running in a
 * cluster, otherwise KUBECONFIG or ~/.kube/config.
 */
export const loadKubeConfig = (env: NodeJS.ProcessEnv = process.env): KubeConfig => {
  const kubeConfig = new KubeConfig();
  if (env['KUBERNETES_SERVICE_HOST']) {
    kubeConfig.loadFromCluster();
  } else {
    kubeConfig.loadFromDefault();
  }
  return kubeConfig;
};

export const createKubeObjectStore = (kubeConfig: KubeConfig, logger: Logger): KubeObjectStore =>
  new KubeObjectStore(
    kubeConfig.makeApiClient(AppsV1Api),
    kubeConfig.makeApiClient(CoreV1Api),
    logger
  );
