import { InMemoryObjectStore, captureLogger } from '../../testing/fakes';
import { StorageError } from '../../utils/errors';
import { createHealthHandler } from './index';

function unreachableStore(): InMemoryObjectStore {
  const store = new InMemoryObjectStore();
  store.checkAccess = async () => {
    throw new StorageError('Bucket alarm-bucket is not reachable');
  };
  return store;
}

describe('health handler', () => {
  it('should report healthy components', async () => {
    const handler = createHealthHandler({
      store: () => new InMemoryObjectStore(),
      dlqDepth: async () => 2,
      logger: captureLogger().logger,
    });

    const response = await handler();

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toEqual({
      status: 'healthy',
      components: { storage: 'healthy', dlq: 'healthy', dlqDepth: 2 },
    });
  });

  it('should report degraded when dead-lettered alarms pile up', async () => {
    const handler = createHealthHandler({
      store: () => new InMemoryObjectStore(),
      dlqDepth: async () => 11,
      logger: captureLogger().logger,
    });

    expect(JSON.parse((await handler()).body)).toEqual({
      status: 'degraded',
      components: { storage: 'healthy', dlq: 'degraded', dlqDepth: 11 },
    });
  });

  it('should report unhealthy when the bucket cannot be reached', async () => {
    const handler = createHealthHandler({
      store: unreachableStore,
      dlqDepth: async () => 50,
      logger: captureLogger().logger,
    });

    expect(JSON.parse((await handler()).body).status).toBe('unhealthy');
  });

  it('should leave the DLQ out when none is configured', async () => {
    const handler = createHealthHandler({ store: () => new InMemoryObjectStore(), logger: captureLogger().logger });

    expect(JSON.parse((await handler()).body)).toEqual({ status: 'healthy', components: { storage: 'healthy' } });
  });

  it('should not fail the check when the DLQ depth cannot be read', async () => {
    const handler = createHealthHandler({
      store: () => new InMemoryObjectStore(),
      dlqDepth: async () => {
        throw new Error('AccessDenied');
      },
      logger: captureLogger().logger,
    });

    expect(JSON.parse((await handler()).body)).toEqual({
      status: 'healthy',
      components: { storage: 'healthy', dlq: 'healthy', dlqDepth: 0 },
    });
  });
});
