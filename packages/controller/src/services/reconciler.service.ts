import type { LimitsDocument } from '@receive-limits/shared';
import { ConfigurationError } from '../errors/controller.errors';

const assertCount = (value: number, name: string): void => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`, [name]);
  }
};

/**
 * Aggregate head series limit for the receive fleet: ready replicas times
 * what a single replica can hold. Zero replicas gives a limit of zero.
 */
export const computeAggregateLimit = (replicaCount: number, perReplicaCapacity: number): number => {
  assertCount(replicaCount, 'replicaCount');
  assertCount(perReplicaCapacity, 'perReplicaCapacity');

  const aggregateLimit = replicaCount * perReplicaCapacity;
  if (!Number.isSafeInteger(aggregateLimit)) {
    throw new ConfigurationError(
      `head series limit ${replicaCount} x ${perReplicaCapacity} exceeds the integer range`,
      ['perReplicaCapacity']
    );
  }
  return aggregateLimit;
};

/**
 * Return a copy of `baseDocument` with the default tenant's head series limit
 * set to the aggregate. Every other field is carried over as is.
 */
export const reconcile = (
  replicaCount: number,
  perReplicaCapacity: number,
  baseDocument: LimitsDocument
): LimitsDocument => {
  const headSeriesLimit = computeAggregateLimit(replicaCount, perReplicaCapacity);

  return {
    ...baseDocument,
    write: {
      ...baseDocument.write,
      default: {
        ...baseDocument.write.default,
        head_series_limit: headSeriesLimit,
      },
    },
  };
};
