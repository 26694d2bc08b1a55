import { readFileSync } from 'node:fs';
import { Router } from 'express';
import type { ServerConfig } from '../config.js';

const OPENAPI_PATH = new URL('../openapi.json', import.meta.url);

interface OpenApiDocument {
  info: { title: string; version: string; description?: string };
  [key: string]: unknown;
}

function loadOpenApi(config: ServerConfig): OpenApiDocument {
  const doc: OpenApiDocument = JSON.parse(readFileSync(OPENAPI_PATH, 'utf-8'));
  return { ...doc, info: { ...doc.info, title: config.appName, version: config.appVersion } };
}

/** Root, liveness and API description endpoints */
export function createSystemRouter(config: ServerConfig): Router {
  const router = Router();
  let openapi: OpenApiDocument | null = null;

  router.get('/', (_req, res) => {
    res.json({
      message: `Welcome to ${config.appName}`,
      version: config.appVersion,
      docs: '/openapi.json',
    });
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', app: config.appName, version: config.appVersion });
  });

  router.get('/openapi.json', (_req, res) => {
    openapi ??= loadOpenApi(config);
    res.json(openapi);
  });

  return router;
}
