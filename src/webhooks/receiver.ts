import { Hono, type Context } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import { z } from 'zod';
import type { Side } from '../model.js';
import type { Logger } from '../log.js';
import type { Orchestrator } from '../sync/orchestrator.js';
import { verifySignature, type SignatureEncoding } from './signature.js';

export const PLANNER_EVENT_TYPES = new Set([
  'page.created',
  'page.properties_updated',
  'page.content_updated',
  'page.deleted',
]);

export const TASK_EVENT_NAMES = new Set([
  'item:added',
  'item:updated',
  'item:completed',
  'item:uncompleted',
  'item:deleted',
]);

const PlannerPayloadSchema = z.object({
  type: z.string().min(1),
  entity: z.object({ id: z.string().min(1) }).optional(),
  data: z.object({ id: z.string().min(1) }).optional(),
});

const TasksPayloadSchema = z.object({
  event_name: z.string().min(1),
  event_data: z.object({ id: z.union([z.string().min(1), z.number()]).transform(String) }),
});

export interface IncomingEvent {
  eventType: string;
  entityId: string;
}

export type ParseResult =
  | { ok: true; event: IncomingEvent; relevant: boolean }
  | { ok: false; error: string };

export function parsePlannerPayload(body: unknown): ParseResult {
  const parsed = PlannerPayloadSchema.safeParse(body);
  if (!parsed.success) return { ok: false, error: 'expected { type, entity: { id } }' };
  const entityId = parsed.data.entity?.id ?? parsed.data.data?.id;
  if (!entityId) return { ok: false, error: 'missing entity id' };
  const eventType = parsed.data.type;
  return { ok: true, event: { eventType, entityId }, relevant: PLANNER_EVENT_TYPES.has(eventType) };
}

export function parseTasksPayload(body: unknown): ParseResult {
  const parsed = TasksPayloadSchema.safeParse(body);
  if (!parsed.success) return { ok: false, error: 'expected { event_name, event_data: { id } }' };
  const eventType = parsed.data.event_name;
  return {
    ok: true,
    event: { eventType, entityId: parsed.data.event_data.id },
    relevant: TASK_EVENT_NAMES.has(eventType),
  };
}

export interface WebhookAppOptions {
  orchestrator: Pick<Orchestrator, 'enqueue' | 'getStatus'>;
  plannerSecret?: string;
  tasksSecret?: string;
  logger: Logger;
}

interface Route {
  source: Side;
  secret?: string;
  signatureHeader: string;
  signatureEncoding: SignatureEncoding;
  parse(body: unknown): ParseResult;
}

/**
 * Webhook endpoints. Handlers only verify, parse and enqueue; reconciliation
 * happens on the orchestrator's consumer.
 */
export function createWebhookApp(opts: WebhookAppOptions): Hono {
  const app = new Hono();
  const log = opts.logger.child('webhooks');

  const receive = async (c: Context, route: Route) => {
    const raw = await c.req.text();

    if (route.secret && !verifySignature(route.secret, raw, c.req.header(route.signatureHeader), route.signatureEncoding)) {
      log.warn('signature mismatch', { source: route.source });
      return c.json({ error: 'invalid signature' }, 401);
    }

    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch {
      return c.json({ error: 'body is not valid JSON' }, 400);
    }

    // subscription handshake
    if (route.source === 'A' && typeof body === 'object' && body !== null && 'verification_token' in body) {
      log.info('planner verification token received');
      return c.json({ status: 'verification' });
    }

    const result = route.parse(body);
    if (!result.ok) return c.json({ error: result.error }, 400);

    const { eventType, entityId } = result.event;
    if (!result.relevant) {
      log.debug('event ignored', { source: route.source, eventType });
      return c.json({ status: 'ignored', eventType });
    }

    opts.orchestrator.enqueue(route.source, eventType, entityId);
    return c.json({ status: 'queued', eventType, entityId });
  };

  app.get('/health', async (c) => {
    const status = await opts.orchestrator.getStatus();
    return c.json({ status: 'ok', ...status });
  });

  app.get('/webhooks/planner', (c) => {
    const challenge = c.req.query('challenge');
    if (!challenge) return c.json({ error: 'missing challenge' }, 400);
    return c.json({ challenge });
  });

  app.post('/webhooks/planner', (c) =>
    receive(c, {
      source: 'A',
      secret: opts.plannerSecret,
      signatureHeader: 'x-notion-signature',
      signatureEncoding: 'hex',
      parse: parsePlannerPayload,
    }),
  );

  app.post('/webhooks/tasks', (c) =>
    receive(c, {
      source: 'B',
      secret: opts.tasksSecret,
      signatureHeader: 'x-todoist-hmac-sha256',
      signatureEncoding: 'base64',
      parse: parseTasksPayload,
    }),
  );

  app.onError((err, c) => {
    log.error('webhook handler failed', err);
    return c.json({ error: 'internal error' }, 500);
  });

  return app;
}

export interface RunningServer {
  port: number;
  close(): Promise<void>;
}

export function startWebhookServer(app: Hono, port: number, logger: Logger): RunningServer {
  const server: ServerType = serve({ fetch: app.fetch, port }, (info) => {
    logger.info(`webhooks listening on :${info.port}`);
  });
  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}
