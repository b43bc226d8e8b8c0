import { InboundWebhookProcessor, MockStorageAdapter, StorageAdapter } from '../../src/testing';
import { HealthController } from '../../src/modules';
import { ACP_SECRET, createTestEngine } from '../helpers/test-engine';

describe('HealthController', () => {
  function controllerFor(storageAdapter: StorageAdapter): HealthController {
    const engine = createTestEngine();
    return new HealthController(
      storageAdapter,
      new InboundWebhookProcessor({
        storageAdapter,
        authorizationService: engine.authorizationService,
        resolveSecrets: () => [ACP_SECRET],
        pspAllowlist: ['psp-test'],
        clock: engine.clock.now,
      }),
    );
  }

  it('should report ready while the store answers', async () => {
    const readiness = await controllerFor(new MockStorageAdapter()).readiness();

    expect(readiness.status).toBe('ready');
    expect(readiness.checks).toEqual({ database: true, pipeline: true });
    expect(readiness.details.database).toBe('connected');
    expect(readiness.details.pipeline.pspAllowlist).toEqual(['psp-test']);
  });

  it('should report not ready when the store fails', async () => {
    const readiness = await controllerFor(new MockStorageAdapter({ throwOnError: true })).readiness();

    expect(readiness.status).toBe('not_ready');
    expect(readiness.checks.database).toBe(false);
    expect(readiness.details.database).toBe('disconnected');
  });

  it('should include storage counts in the statistics', async () => {
    const stats = await controllerFor(new MockStorageAdapter()).statistics();

    expect(stats.storage.authorizations).toBe(0);
    expect(stats.pipeline.pspAllowlist).toEqual(['psp-test']);
    expect(stats.runtime.node).toBe(process.version);
  });
});
