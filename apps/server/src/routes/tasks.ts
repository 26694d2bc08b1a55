import { Router, type Request } from 'express';
import { ValidationError, type TaskService } from '@taskboard/core';
import { toWireTask, toWireStatistics } from '../serializers.js';

/** Read an optional single-valued query parameter; repeated or nested values are rejected */
function queryParam(req: Request, name: string): string | undefined {
  const value = req.query[name];
  if (value === undefined || typeof value === 'string') return value;
  throw new ValidationError(`${name}: must be a single value`, [
    { path: name, message: 'must be a single value', code: 'invalid_type' },
  ]);
}

export function createTaskRouter(service: TaskService): Router {
  const router = Router();

  router.get('/', (req, res) => {
    const tasks = service.list({
      status: queryParam(req, 'status'),
      priority: queryParam(req, 'priority'),
    });
    res.json(tasks.map(toWireTask));
  });

  // Fixed paths go before /:id
  router.get('/status/:status', (req, res) => {
    res.json(service.listByStatus(req.params.status).map(toWireTask));
  });

  router.get('/analytics/statistics', (_req, res) => {
    res.json(toWireStatistics(service.statistics()));
  });

  router.get('/:id', (req, res) => {
    res.json(toWireTask(service.get(req.params.id)));
  });

  router.post('/', (req, res) => {
    const task = service.create(req.body);
    res.status(201).location(`${req.baseUrl}/${task.id}`).json(toWireTask(task));
  });

  router.put('/:id', (req, res) => {
    res.json(toWireTask(service.update(req.params.id, req.body)));
  });

  router.patch('/:id/complete', (req, res) => {
    res.json(toWireTask(service.complete(req.params.id)));
  });

  router.delete('/:id', (req, res) => {
    service.delete(req.params.id);
    res.status(204).end();
  });

  return router;
}
