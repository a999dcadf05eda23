import { encodeLimitsDocument, type LimitsDocument } from '@receive-limits/shared';
import { AlreadyExistsError, ConflictError } from '../errors/controller.errors';
import type { ArtifactInput, ObjectStore } from '../store/object-store';
import { silentLogger, type Logger } from '../utils/logger';

export type PublishAction = 'created' | 'updated';

export interface PublishResult {
  action: PublishAction;
  resourceVersion?: string;
}

/**
 * Writes the generated limits ConfigMap
 */
export class PublisherService {
  constructor(
    private readonly store: ObjectStore,
    private readonly namespace: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Create the ConfigMap, or replace it when it already exists.
   *
   * At most two write attempts are made: the create, and on AlreadyExists a
   * single update carrying the resourceVersion fetched just before it. Any
   * other failure, including one during the update path, rejects.
   */
  async publish(name: string, key: string, document: LimitsDocument): Promise<PublishResult> {
    const artifact: ArtifactInput = {
      name,
      data: { [key]: encodeLimitsDocument(document) },
    };

    try {
      const created = await this.store.createArtifact(this.namespace, artifact);
      this.logger.info({ name, resourceVersion: created.resourceVersion }, `Successfully created ConfigMap: ${name}`);
      return { action: 'created', resourceVersion: created.resourceVersion };
    } catch (error) {
      if (!(error instanceof AlreadyExistsError)) {
        throw error;
      }
    }

    this.logger.info({ name }, `ConfigMap ${name} already exists. Updating...`);
    return this.replace(artifact);
  }

  private async replace(artifact: ArtifactInput): Promise<PublishResult> {
    const existing = await this.store.getArtifact(this.namespace, artifact.name);
    if (!existing.resourceVersion) {
      throw new ConflictError(`ConfigMap ${artifact.name} has no resourceVersion to update against`, {
        namespace: this.namespace,
        name: artifact.name,
      });
    }

    const updated = await this.store.updateArtifact(this.namespace, {
      ...artifact,
      resourceVersion: existing.resourceVersion,
    });

    this.logger.info(
      { name: artifact.name, resourceVersion: updated.resourceVersion },
      `Successfully updated ConfigMap: ${artifact.name}`
    );
    return { action: 'updated', resourceVersion: updated.resourceVersion };
  }
}
