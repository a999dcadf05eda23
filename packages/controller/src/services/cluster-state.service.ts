import type { ObjectStore } from '../store/object-store';
import { silentLogger, type Logger } from '../utils/logger';

/**
 * Reads receiver scale from the cluster
 */
export class ClusterStateService {
  constructor(
    private readonly store: ObjectStore,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Sum the ready replicas of every workload group matching the selector.
   *
   * Partially ready groups contribute the replicas that are ready. A failed
   * list rejects; it is never reported as zero.
   */
  async countReadyReplicas(namespace: string, labelSelector: string): Promise<number> {
    const groups = await this.store.listWorkloadGroups(namespace, labelSelector);

    let readyReplicas = 0;
    for (const group of groups) {
      readyReplicas += group.readyReplicas;
      this.logger.debug(
        {
          statefulSet: group.name,
          readyReplicas: group.readyReplicas,
          desiredReplicas: group.desiredReplicas,
        },
        `StatefulSet ${group.name} has ${group.readyReplicas}/${group.desiredReplicas} ready replicas`
      );
    }

    this.logger.debug(
      { namespace, labelSelector, groups: groups.length, readyReplicas },
      'Counted ready receiver replicas'
    );
    return readyReplicas;
  }
}
