import { decodeLimitsDocument, type LimitsDocument } from '@receive-limits/shared';
import { DecodeError, KeyMissingError } from '../errors/controller.errors';
import type { ObjectStore } from '../store/object-store';
import { silentLogger, type Logger } from '../utils/logger';

/**
 * Loads the operator-maintained limits document from its ConfigMap
 */
export class LimitsSourceService {
  constructor(
    private readonly store: ObjectStore,
    private readonly namespace: string,
    private readonly logger: Logger = silentLogger
  ) {}

  /**
   * Fetch `name` and decode the text stored under `key`.
   *
   * Rejects with NotFoundError when the ConfigMap is missing, KeyMissingError
   * when the key is absent and DecodeError when the text is not a limits document.
   */
  async load(name: string, key: string): Promise<LimitsDocument> {
    const artifact = await this.store.getArtifact(this.namespace, name);

    const source = Object.hasOwn(artifact.data, key) ? artifact.data[key] : undefined;
    if (source === undefined) {
      throw new KeyMissingError(`key ${key} not found in ConfigMap ${name}`, {
        namespace: this.namespace,
        name,
        key,
        availableKeys: Object.keys(artifact.data),
      });
    }

    const result = decodeLimitsDocument(source);
    if (!result.success) {
      throw new DecodeError(`failed to parse limits config ${key} in ConfigMap ${name}`, result.issues, {
        namespace: this.namespace,
        name,
        key,
      });
    }

    this.logger.debug(
      { name, key, resourceVersion: artifact.resourceVersion },
      'Loaded limits configuration'
    );
    return result.document;
  }
}
