// Pruebas del limite global de requests.
import request from 'supertest';
import { describe, expect, it, vi } from 'vitest';
import { crearDependenciasMemoria } from './utils/repositoriosMemoria';

describe('rate limit', () => {
  it('responde 429 al exceder el limite y no cuenta los health checks', async () => {
    const anterior = {
      RATE_LIMIT_LIMIT: process.env.RATE_LIMIT_LIMIT,
      RATE_LIMIT_WINDOW_MS: process.env.RATE_LIMIT_WINDOW_MS
    };
    process.env.RATE_LIMIT_LIMIT = '2';
    process.env.RATE_LIMIT_WINDOW_MS = '60000';

    try {
      vi.resetModules();
      const { crearApp } = await import('../src/app');
      const app = crearApp(crearDependenciasMemoria());

      await request(app).get('/api/salud/live').expect(200);
      await request(app).get('/api/salud/live').expect(200);
      await request(app).get('/api/salud/live').expect(200);

      await request(app).get('/api/empresas').expect(401);
      await request(app).get('/api/empresas').expect(401);
      const respuesta = await request(app).get('/api/empresas').expect(429);
      expect(respuesta.headers['retry-after']).toBeTruthy();
    } finally {
      for (const [clave, valor] of Object.entries(anterior)) {
        if (valor === undefined) delete process.env[clave];
        else process.env[clave] = valor;
      }
      vi.resetModules();
    }
  });
});
