/**
 * Retry Queue Routes
 *
 * - POST /tasks/drain           — one drain sweep (for schedulers that call HTTP)
 * - GET  /tasks                 — list tasks, filterable by state and journal
 * - GET  /tasks/stats           — counts per state
 * - GET  /tasks/:taskId         — one task, including its payload
 * - POST /tasks/:taskId/requeue — give an abandoned task a fresh set of attempts
 */

import { Hono } from 'hono';
import type { GradingBridge } from '../core/grading-bridge.js';
import type { DeliveryTask } from '../types/grading-contract.js';
import { drainRequestSchema, taskIdSchema, taskListQuerySchema } from '../schemas/host-events.js';
import { parseOptionalJsonBody } from './shared/request-body.js';

/** Task without its payload, which carries reviewer data */
function summarize(task: DeliveryTask): Omit<DeliveryTask, 'payload' | 'claimToken'> {
  const { payload: _payload, claimToken: _claimToken, ...summary } = task;
  return summary;
}

export function createTaskRouter(bridge: GradingBridge): Hono {
  const router = new Hono();

  router.post('/tasks/drain', async (c) => {
    const body = await parseOptionalJsonBody(c, drainRequestSchema);
    const now = body.now ? new Date(body.now) : undefined;

    const result = await bridge.drainDueTasks(now);
    return c.json({ ok: true, ...result });
  });

  router.get('/tasks', async (c) => {
    const query = taskListQuerySchema.parse(c.req.query());
    const page = await bridge.delivery.listTasks(
      { state: query.state, journalId: query.journalId },
      { limit: query.limit, offset: query.offset }
    );
    return c.json({
      ok: true,
      tasks: page.items.map(summarize),
      pagination: { total: page.total, offset: page.offset, limit: page.limit, hasMore: page.hasMore },
    });
  });

  router.get('/tasks/stats', async (c) => {
    const stats = await bridge.delivery.stats();
    return c.json({ ok: true, stats });
  });

  router.get('/tasks/:taskId', async (c) => {
    const taskId = taskIdSchema.parse(c.req.param('taskId'));
    const task = await bridge.delivery.getTask(taskId);
    return c.json({ ok: true, task: { ...summarize(task), payload: task.payload } });
  });

  router.post('/tasks/:taskId/requeue', async (c) => {
    const taskId = taskIdSchema.parse(c.req.param('taskId'));
    const task = await bridge.delivery.requeueTask(taskId);
    return c.json({ ok: true, task: summarize(task) });
  });

  return router;
}
