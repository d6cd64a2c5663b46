import { SourceRegistry } from '../sources/source.registry';
import { FakeSource } from '../sources/testing/fake-source';
import { HealthService } from './health.service';

describe('HealthService', () => {
  const registry = new SourceRegistry([new FakeSource('books'), new FakeSource('librivox')]);

  it('reports the database and the source count', async () => {
    const service = new HealthService({ query: jest.fn().mockResolvedValue([{ '?column?': 1 }]) }, registry);

    await expect(service.check()).resolves.toEqual({ status: 'ok', db: 'ok', sources: 2 });
  });

  it('reports a database that does not answer', async () => {
    const service = new HealthService({ query: jest.fn().mockRejectedValue(new Error('ECONNREFUSED')) }, registry);

    await expect(service.check()).resolves.toEqual({ status: 'ok', db: 'down', sources: 2 });
  });
});
