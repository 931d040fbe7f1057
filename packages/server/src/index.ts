import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import fs from 'fs';
import type { HealthResponse } from '@metadata-writer/shared';
import type { IJobService } from './domain/ports';
import { jobRoutes } from './routes/jobs';
import { healthRoutes } from './routes/health';

export interface ServerDeps {
  jobs: IJobService;
  health: () => Promise<HealthResponse>;
  uploadDir: string;
  maxUploadBytes: number;
}

export function buildServer(deps: ServerDeps): FastifyInstance {
  const server = Fastify({ logger: false });

  server.register(cors, { origin: '*' });
  server.register(multipart, { limits: { fileSize: deps.maxUploadBytes } });

  if (!fs.existsSync(deps.uploadDir)) fs.mkdirSync(deps.uploadDir, { recursive: true });

  server.get('/', async () => ({ status: 'online', service: 'Video Metadata Writer' }));

  healthRoutes(server, deps.health);
  jobRoutes(server, { jobs: deps.jobs, uploadDir: deps.uploadDir, health: deps.health });

  return server;
}

export { loadConfig } from './config/env';
export type { AppConfig } from './config/env';
export * from './domain/errors';
export * from './services';
