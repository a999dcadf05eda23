import {
  AlreadyExistsError,
  ConflictError,
  ConnectivityError,
  NotFoundError,
} from '../errors/controller.errors';
import type {
  Artifact,
  ArtifactInput,
  ArtifactUpdate,
  ObjectStore,
  WorkloadGroup,
} from '../store/object-store';

export type StoreOperation =
  | 'listWorkloadGroups'
  | 'getArtifact'
  | 'createArtifact'
  | 'updateArtifact';

/**
 * Record of a single call made against the store
 */
export interface StoreCall {
  operation: StoreOperation;
  namespace: string;
  name?: string;
  labelSelector?: string;
  resourceVersion?: string;
}

interface LabelledWorkload {
  namespace: string;
  labels: Record<string, string>;
  group: WorkloadGroup;
}

/**
 * Match labels against an equality-based selector: `k=v`, `k==v`, `k!=v`, `k` and `!k`
 */
export const matchesSelector = (labels: Record<string, string>, selector: string): boolean => {
  const requirements = selector
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean);

  return requirements.every((requirement) => {
    const notEquals = requirement.indexOf('!=');
    if (notEquals > 0) {
      const key = requirement.slice(0, notEquals).trim();
      return labels[key] !== requirement.slice(notEquals + 2).trim();
    }

    const equals = requirement.indexOf('=');
    if (equals > 0) {
      const key = requirement.slice(0, equals).trim();
      const value = requirement.slice(equals).replace(/^==?/, '').trim();
      return labels[key] === value;
    }

    if (requirement.startsWith('!')) {
      return !(requirement.slice(1).trim() in labels);
    }
    return requirement in labels;
  });
};

const artifactKey = (namespace: string, name: string): string => `${namespace}/${name}`;

/**
 * In-process object store with resourceVersion semantics.
 *
 * Every write bumps a store-wide version counter. Calls are recorded in order,
 * and failures can be queued per operation.
 */
export class InMemoryObjectStore implements ObjectStore {
  readonly calls: StoreCall[] = [];
  private artifacts = new Map<string, Artifact>();
  private workloads: LabelledWorkload[] = [];
  private failures = new Map<StoreOperation, Error[]>();
  private version = 0;
  private listeners: Array<(call: StoreCall) => void> = [];

  /**
   * Register a workload group under the given labels
   */
  addWorkloadGroup(namespace: string, group: WorkloadGroup, labels: Record<string, string>): void {
    this.workloads.push({ namespace, labels: { ...labels }, group: { ...group } });
  }

  /**
   * Create or overwrite an artifact without recording a call
   */
  seedArtifact(namespace: string, input: ArtifactInput): Artifact {
    return this.write(namespace, input);
  }

  /**
   * Current stored artifact, without recording a call
   */
  peekArtifact(namespace: string, name: string): Artifact | undefined {
    return this.artifacts.get(artifactKey(namespace, name));
  }

  removeArtifact(namespace: string, name: string): void {
    this.artifacts.delete(artifactKey(namespace, name));
  }

  /**
   * Make the next call to `operation` reject with `error`
   */
  failNext(operation: StoreOperation, error: Error): void {
    const queue = this.failures.get(operation) ?? [];
    queue.push(error);
    this.failures.set(operation, queue);
  }

  /**
   * Run `listener` after each call is recorded and before it is served
   */
  onCall(listener: (call: StoreCall) => void): void {
    this.listeners.push(listener);
  }

  callsTo(operation: StoreOperation): StoreCall[] {
    return this.calls.filter((call) => call.operation === operation);
  }

  async listWorkloadGroups(namespace: string, labelSelector: string): Promise<WorkloadGroup[]> {
    this.record({ operation: 'listWorkloadGroups', namespace, labelSelector });

    return this.workloads
      .filter((workload) => workload.namespace === namespace)
      .filter((workload) => matchesSelector(workload.labels, labelSelector))
      .map((workload) => ({ ...workload.group }));
  }

  async getArtifact(namespace: string, name: string): Promise<Artifact> {
    this.record({ operation: 'getArtifact', namespace, name });

    const artifact = this.artifacts.get(artifactKey(namespace, name));
    if (!artifact) {
      throw new NotFoundError(`configmaps "${name}" not found`, { namespace, name });
    }
    return artifact;
  }

  async createArtifact(namespace: string, input: ArtifactInput): Promise<Artifact> {
    this.record({ operation: 'createArtifact', namespace, name: input.name });

    if (this.artifacts.has(artifactKey(namespace, input.name))) {
      throw new AlreadyExistsError(`configmaps "${input.name}" already exists`, {
        namespace,
        name: input.name,
      });
    }
    return this.write(namespace, input);
  }

  async updateArtifact(namespace: string, input: ArtifactUpdate): Promise<Artifact> {
    this.record({
      operation: 'updateArtifact',
      namespace,
      name: input.name,
      resourceVersion: input.resourceVersion,
    });

    const current = this.artifacts.get(artifactKey(namespace, input.name));
    if (!current) {
      throw new NotFoundError(`configmaps "${input.name}" not found`, {
        namespace,
        name: input.name,
      });
    }
    if (current.resourceVersion !== input.resourceVersion) {
      throw new ConflictError(
        `Operation cannot be fulfilled on configmaps "${input.name}": the object has been modified`,
        { namespace, name: input.name, resourceVersion: input.resourceVersion }
      );
    }
    return this.write(namespace, input);
  }

  private record(call: StoreCall): void {
    this.calls.push(call);
    this.listeners.forEach((listener) => listener(call));

    const queued = this.failures.get(call.operation)?.shift();
    if (queued) {
      throw queued;
    }
  }

  private write(namespace: string, input: ArtifactInput): Artifact {
    this.version += 1;
    const artifact: Artifact = {
      name: input.name,
      namespace,
      data: { ...input.data },
      resourceVersion: String(this.version),
    };
    this.artifacts.set(artifactKey(namespace, input.name), artifact);
    return artifact;
  }
}

/**
 * Error for simulating an unreachable API server
 */
export const unreachable = (operation: StoreOperation): ConnectivityError =>
  new ConnectivityError(`connect ECONNREFUSED 127.0.0.1:6443 during ${operation}`);
