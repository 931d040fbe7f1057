import type { FastifyInstance } from 'fastify';
import type { HealthResponse } from '@metadata-writer/shared';

export function healthRoutes(server: FastifyInstance, health: () => Promise<HealthResponse>): void {
  server.get<{ Reply: HealthResponse }>('/api/health', async () => health());
}
