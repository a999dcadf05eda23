/**
 * Tests for loading the source limits document
 */

import { DecodeError, KeyMissingError, NotFoundError } from '../../errors/controller.errors';
import { InMemoryObjectStore } from '../../__tests__/in-memory.store';
import { LimitsSourceService } from '../limits-source.service';

describe('LimitsSourceService', () => {
  let store: InMemoryObjectStore;
  let service: LimitsSourceService;

  beforeEach(() => {
    store = new InMemoryObjectStore();
    service = new LimitsSourceService(store, 'monitoring');
  });

  it('should decode the document under the key', async () => {
    store.seedArtifact('monitoring', {
      name: 'receive-limits',
      data: { 'config.yaml': 'write:\n  tenants:\n    team-a:\n      head_series_limit: 100\n' },
    });

    const document = await service.load('receive-limits', 'config.yaml');

    expect(document.write.tenants).toEqual({ 'team-a': { head_series_limit: 100 } });
    expect(store.calls).toEqual([{ operation: 'getArtifact', namespace: 'monitoring', name: 'receive-limits' }]);
  });

  it('should decode an empty entry as the default document', async () => {
    store.seedArtifact('monitoring', { name: 'receive-limits', data: { 'config.yaml': '' } });

    const document = await service.load('receive-limits', 'config.yaml');

    expect(document.write.default).toEqual({});
  });

  it('should reject with NotFoundError when the ConfigMap is missing', async () => {
    await expect(service.load('receive-limits', 'config.yaml')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('should reject with KeyMissingError naming the key', async () => {
    store.seedArtifact('monitoring', { name: 'receive-limits', data: { 'other.yaml': '' } });

    const failure = service.load('receive-limits', 'config.yaml');

    await expect(failure).rejects.toBeInstanceOf(KeyMissingError);
    await expect(failure).rejects.toThrow('key config.yaml not found in ConfigMap receive-limits');
  });

  it('should reject with DecodeError for a malformed document', async () => {
    store.seedArtifact('monitoring', {
      name: 'receive-limits',
      data: { 'config.yaml': 'write:\n  default:\n    head_series_limit: lots\n' },
    });

    const failure = service.load('receive-limits', 'config.yaml');

    await expect(failure).rejects.toBeInstanceOf(DecodeError);
    await expect(failure).rejects.toMatchObject({
      issues: [{ path: 'write.default.head_series_limit', message: 'Expected an integer' }],
    });
  });
});
