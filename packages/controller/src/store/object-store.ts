/**
 * Replicated workload observed in the cluster (a StatefulSet)
 */
export interface WorkloadGroup {
  readonly name: string;
  readonly desiredReplicas: number;
  readonly readyReplicas: number;
}

/**
 * Named key/value text object (a ConfigMap)
 */
export interface Artifact {
  readonly name: string;
  readonly namespace: string;
  readonly data: Readonly<Record<string, string>>;
  readonly resourceVersion?: string;
}

export interface ArtifactInput {
  readonly name: string;
  readonly data: Readonly<Record<string, string>>;
}

export interface ArtifactUpdate extends ArtifactInput {
  readonly resourceVersion: string;
}

/**
 * Cluster object store consumed by the controller.
 *
 * Implementations reject with the controller error types:
 * NotFoundError for a missing object, AlreadyExistsError when a create hits a
 * taken name, ConflictError for a stale resourceVersion on update, and
 * ConnectivityError for everything else.
 */
export interface ObjectStore {
  listWorkloadGroups(namespace: string, labelSelector: string): Promise<WorkloadGroup[]>;
  getArtifact(namespace: string, name: string): Promise<Artifact>;
  createArtifact(namespace: string, artifact: ArtifactInput): Promise<Artifact>;
  updateArtifact(namespace: string, artifact: ArtifactUpdate): Promise<Artifact>;
}
