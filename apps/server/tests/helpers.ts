import { z } from 'zod';
import type { Server } from 'node:http';
import type { Express } from 'express';
import type { ServerConfig } from '../src/config.js';

export const testConfig: ServerConfig = {
  appName: 'Taskboard',
  appVersion: '1.0.0',
  nodeEnv: 'test',
  databasePath: ':memory:',
  host: '127.0.0.1',
  port: 0,
  logLevel: 'silent',
};

export interface Listening {
  baseUrl: string;
  close(): Promise<void>;
}

/** Serve `app` on an ephemeral local port */
export async function listen(app: Express): Promise<Listening> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('expected a TCP address');

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    }),
  };
}

/** A clock that starts at `start` and advances one second on every call */
export function steppingClock(start: string): () => Date {
  let t = Date.parse(start);
  return () => {
    const d = new Date(t);
    t += 1000;
    return d;
  };
}

export const wireTaskSchema = z.object({
  id: z.string(),
  title: z.string(),
  description: z.string().nullable(),
  status: z.enum(['pending', 'in_progress', 'completed']),
  priority: z.enum(['low', 'medium', 'high']),
  due_date: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
}).strict();

export const errorBodySchema = z.object({
  error: z.object({
    kind: z.string(),
    message: z.string(),
    details: z.record(z.unknown()),
  }),
});

export async function readTask(res: Response): Promise<z.infer<typeof wireTaskSchema>> {
  return wireTaskSchema.parse(await res.json());
}

export async function readTasks(res: Response): Promise<z.infer<typeof wireTaskSchema>[]> {
  return z.array(wireTaskSchema).parse(await res.json());
}

export async function readError(res: Response): Promise<z.infer<typeof errorBodySchema>['error']> {
  return errorBodySchema.parse(await res.json()).error;
}

export function jsonRequest(method: string, body: unknown): RequestInit {
  return {
    method,
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}
