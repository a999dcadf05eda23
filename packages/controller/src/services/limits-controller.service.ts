import type { ObjectStore } from '../store/object-store';
import { silentLogger, type Logger } from '../utils/logger';
import { ClusterStateService } from './cluster-state.service';
import { LimitsSourceService } from './limits-source.service';
import { PublisherService, type PublishAction } from './publisher.service';
import { reconcile } from './reconciler.service';

/**
 * What a controller instance reconciles
 */
export interface LimitsControllerOptions {
  namespace: string;
  configMapName: string;
  limitsKey: string;
  generatedConfigMapName: string;
  statefulSetLabel: string;
  activeSeriesMax: number;
}

/**
 * Outcome of one successful cycle
 */
export interface CycleRecord {
  startedAt: string;
  finishedAt: string;
  replicas: number;
  aggregateLimit: number;
  action: PublishAction;
  resourceVersion?: string;
}

export interface ControllerStatus {
  cycles: number;
  lastCycle: CycleRecord | null;
}

/**
 * One reconciliation pipeline: count ready receivers, load the source limits,
 * inject the aggregate head series limit and publish the generated ConfigMap.
 */
export class LimitsController {
  private readonly clusterState: ClusterStateService;
  private readonly limitsSource: LimitsSourceService;
  private readonly publisher: PublisherService;
  private status: ControllerStatus = { cycles: 0, lastCycle: null };

  constructor(
    store: ObjectStore,
    private readonly options: LimitsControllerOptions,
    private readonly logger: Logger = silentLogger,
    private readonly now: () => Date = () => new Date()
  ) {
    this.clusterState = new ClusterStateService(store, logger.child({ service: 'cluster-state' }));
    this.limitsSource = new LimitsSourceService(store, options.namespace, logger.child({ service: 'limits-source' }));
    this.publisher = new PublisherService(store, options.namespace, logger.child({ service: 'publisher' }));
  }

  /**
   * Run the pipeline once. Any failure rejects and leaves the status untouched.
   */
  async runCycle(): Promise<CycleRecord> {
    const startedAt = this.now().toISOString();
    const {
      namespace,
      configMapName,
      limitsKey,
      generatedConfigMapName,
      statefulSetLabel,
      activeSeriesMax,
    } = this.options;

    const replicas = await this.clusterState.countReadyReplicas(namespace, statefulSetLabel);
    const baseDocument = await this.limitsSource.load(configMapName, limitsKey);

    const document = reconcile(replicas, activeSeriesMax, baseDocument);
    const aggregateLimit = document.write.default.head_series_limit ?? 0;
    this.logger.debug({ replicas, activeSeriesMax, aggregateLimit }, `Calculated global head_series_limit: ${aggregateLimit}`);

    const published = await this.publisher.publish(generatedConfigMapName, limitsKey, document);

    const record: CycleRecord = {
      startedAt,
      finishedAt: this.now().toISOString(),
      replicas,
      aggregateLimit,
      action: published.action,
      resourceVersion: published.resourceVersion,
    };
    this.status = { cycles: this.status.cycles + 1, lastCycle: record };

    this.logger.info(
      { replicas, aggregateLimit, action: published.action, configMap: generatedConfigMapName },
      'Reconciliation cycle completed'
    );
    return record;
  }

  getStatus(): ControllerStatus {
    return this.status;
  }
}
