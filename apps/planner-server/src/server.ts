import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from './logging';
import type { PlannerRuntime } from './runtime';
import {
  evaluateRequestSchema,
  parseRequest,
  planRequestSchema,
  RequestValidationError,
  type PlanRequest,
} from './schemas';

export const SERVICE_NAME = 'waypoint-planner-server';

function sendJson(res: ServerResponse, statusCode: number, body: unknown): void {
  res.writeHead(statusCode, { 'content-type': 'application/json; charset=utf-8' });
  res.end(JSON.stringify(body, null, 2));
}

function sendEvent(res: ServerResponse, event: string, data: unknown): void {
  res.write(`event: ${event}\ndata: ${JSON.stringify(data)}\n\n`);
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString('utf8').trim();
  if (!raw) {
    throw new RequestValidationError(['<root>: request body is empty']);
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new RequestValidationError([`<root>: ${error instanceof Error ? error.message : String(error)}`]);
  }
}

function statusFor(error: unknown): number {
  return error instanceof RequestValidationError ? 400 : 500;
}

function errorBody(error: unknown): { error: string; issues?: string[] } {
  if (error instanceof RequestValidationError) {
    return { error: error.message, issues: error.issues };
  }
  return { error: error instanceof Error ? error.message : String(error) };
}

/** Aborted when the client goes away before the response is complete. */
function disconnectSignal(res: ServerResponse): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function createPlannerHttpServer(runtime: PlannerRuntime, logger: Logger): Server {
  return createServer(async (req, res) => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    const requestLogger = logger.child({ method: req.method, url: pathname });

    if (pathname === '/health') {
      if (req.method !== 'GET') {
        sendJson(res, 405, { error: 'Method not allowed', allowed: ['GET'] });
        return;
      }
      sendJson(res, 200, { ok: true, service: SERVICE_NAME });
      return;
    }

    if (pathname === '/plan') {
      if (req.method !== 'POST') {
        sendJson(res, 405, { error: 'Method not allowed', allowed: ['POST'] });
        return;
      }

      try {
        const payload = parseRequest(planRequestSchema, await readJsonBody(req));
        requestLogger.info('http.plan.received', { travel: payload.travel, hint: payload.hint });
        sendJson(res, 200, await runtime.plan(payload, disconnectSignal(res)));
      } catch (error) {
        requestLogger.error('http.plan.error', { error });
        sendJson(res, statusFor(error), errorBody(error));
      }
      return;
    }

    if (pathname === '/execute') {
      if (req.method !== 'POST') {
        sendJson(res, 405, { error: 'Method not allowed', allowed: ['POST'] });
        return;
      }

      let payload: PlanRequest;
      try {
        payload = parseRequest(planRequestSchema, await readJsonBody(req));
      } catch (error) {
        requestLogger.error('http.execute.error', { error });
        sendJson(res, statusFor(error), errorBody(error));
        return;
      }

      requestLogger.info('http.execute.received', { travel: payload.travel, hint: payload.hint });
      res.writeHead(200, {
        'content-type': 'text/event-stream; charset=utf-8',
        'cache-control': 'no-cache',
        connection: 'keep-alive',
      });

      try {
        await runtime.execute(payload, ({ event, data }) => sendEvent(res, event, data), disconnectSignal(res));
      } catch (error) {
        requestLogger.error('http.execute.error', { error });
        sendEvent(res, 'error', errorBody(error));
      }
      res.end();
      return;
    }

    if (pathname === '/evaluate') {
      if (req.method !== 'POST') {
        sendJson(res, 405, { error: 'Method not allowed', allowed: ['POST'] });
        return;
      }

      try {
        const payload = parseRequest(evaluateRequestSchema, await readJsonBody(req));
        requestLogger.info('http.evaluate.received', { requests: payload.requests.length, hint: payload.hint });
        sendJson(res, 200, await runtime.evaluate(payload, disconnectSignal(res)));
      } catch (error) {
        requestLogger.error('http.evaluate.error', { error });
        sendJson(res, statusFor(error), errorBody(error));
      }
      return;
    }

    sendJson(res, 404, { error: 'Not found' });
  });
}
