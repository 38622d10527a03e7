import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import { createApp } from '../../src/app';
import { createMemoryStore } from '../helpers/test-store';

describe('Health Routes', () => {
  it('should report healthy', async () => {
    const app = createApp(createMemoryStore());

    const response = await request(app).get('/api/health').expect(200);
    expect(response.body.success).toBe(true);
    expect(response.body.data.status).toBe('healthy');
  });

  it('should answer the liveness probe', async () => {
    const app = createApp(createMemoryStore());

    const response = await request(app).get('/api/health/liveness').expect(200);
    expect(response.body.status).toBe('ok');
  });

  it('should be ready when the backend answers', async () => {
    const store = createMemoryStore();
    await store.service.addProduct({ name: 'Bread', quantity: 1 });
    const app = createApp(store);

    const response = await request(app).get('/api/health/readiness').expect(200);
    expect(response.body).toMatchObject({ ready: true, backend: 'memory', lastAllocatedId: 1 });
  });

  it('should not be ready when the backend fails', async () => {
    const store = createMemoryStore();
    vi.spyOn(store.backend, 'readCounter').mockRejectedValue(new Error('unreachable'));
    const app = createApp(store);

    const response = await request(app).get('/api/health/readiness').expect(503);
    expect(response.body).toMatchObject({ ready: false, error: 'Readiness check failed', backend: 'memory' });
  });
});
