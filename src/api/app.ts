import { randomUUID } from 'node:crypto';
import express, { type NextFunction, type Request, type Response } from 'express';
import { z } from 'zod';
import type { MembershipRegistry } from '../domain/directory.js';
import type { WorkflowEngine } from '../domain/engine.js';
import { AuthorizationError, DomainError, InvalidStateError, ValidationError } from '../domain/errors.js';
import type { QueryFacade } from '../domain/query.js';
import {
  APPROVER_ROLES,
  REQUEST_PRIORITIES,
  REQUEST_STATUSES,
  REQUEST_VARIANTS,
  type ActorContext
} from '../domain/types.js';
import { log } from '../observability/logger.js';
import { withRequestContext } from '../observability/request-context.js';

export interface AppDependencies {
  engine: WorkflowEngine;
  queries: QueryFacade;
  registry: MembershipRegistry;
}

const scopeBody = z.object({
  organizationId: z.string().trim().min(1, 'organizationId is required'),
  enterpriseId: z.string().trim().min(1, 'enterpriseId is required')
});

const membershipBody = z.object({
  userId: z.string().trim().min(1, 'userId is required'),
  enterpriseId: z.string().trim().min(1, 'enterpriseId is required'),
  organizationId: z.string().trim().min(1).nullable().default(null),
  roles: z.array(z.enum(APPROVER_ROLES)).min(1, 'at least one role is required')
});

const createBody = z.object({
  variant: z.string({ required_error: 'variant is required' }),
  payload: z.unknown(),
  priority: z.enum(REQUEST_PRIORITIES).optional(),
  targetScope: scopeBody.optional()
});

const approveBody = z.object({
  stepIndex: z.number().int().nonnegative().optional(),
  note: z.string().optional()
});

const rejectBody = z.object({
  reason: z.string({ required_error: 'reason is required' })
});

const noteBody = z.object({
  note: z.string({ required_error: 'note is required' })
});

const requestsQuery = z.object({
  status: z.enum(REQUEST_STATUSES).optional(),
  variant: z.enum(REQUEST_VARIANTS).optional(),
  requesterId: z.string().trim().min(1).optional(),
  approverId: z.string().trim().min(1).optional()
});

const slaQuery = z.object({
  now: z.string().datetime({ offset: true }).optional()
});

function parse<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw ValidationError.fromIssues(
      parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    );
  }
  return parsed.data;
}

function header(req: Request, name: string): string {
  return (req.header(name) || '').trim();
}

function actorIdFromRequest(req: Request): string {
  const userId = header(req, 'x-user-id');
  if (!userId) {
    throw new ValidationError('x-user-id header is required', [{ path: 'x-user-id', message: 'header is required' }]);
  }
  return userId;
}

function actorFromRequest(req: Request): ActorContext {
  const userId = actorIdFromRequest(req);
  const organizationId = header(req, 'x-organization-id');
  const enterpriseId = header(req, 'x-enterprise-id');
  if (!organizationId || !enterpriseId) {
    throw new ValidationError('x-organization-id and x-enterprise-id headers are required', [
      ...(organizationId ? [] : [{ path: 'x-organization-id', message: 'header is required' }]),
      ...(enterpriseId ? [] : [{ path: 'x-enterprise-id', message: 'header is required' }])
    ]);
  }
  return { userId, scope: { organizationId, enterpriseId } };
}

function rolesFromRequest(req: Request): string[] {
  const rolesRaw = header(req, 'x-roles');
  return rolesRaw
    ? rolesRaw
        .split(',')
        .map((role) => role.trim())
        .filter(Boolean)
    : [];
}

function isBodyParserError(error: unknown): error is { status: number; message: string } {
  return (
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number' &&
    error.status >= 400 &&
    error.status < 500
  );
}

export function createApp({ engine, queries, registry }: AppDependencies): express.Express {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = header(req, 'x-request-id') || randomUUID();
    res.setHeader('x-request-id', requestId);
    withRequestContext(() => {
      log('DEBUG', 'http request', { method: req.method, path: req.originalUrl });
      next();
    }, requestId);
  });

  app.get('/healthz', (_req, res) => {
    res.status(200).json({ ok: true });
  });

  app.post('/api/v1/directory/memberships', (req, res) => {
    actorIdFromRequest(req);
    if (!rolesFromRequest(req).includes('ADMIN')) {
      throw new AuthorizationError('ADMIN role is required to manage approver memberships');
    }
    const membership = registry.upsertMembership(parse(membershipBody, req.body));
    res.status(201).json(membership);
  });

  app.post('/api/v1/requests', async (req, res) => {
    const actor = actorFromRequest(req);
    const body = parse(createBody, req.body);
    const created = await engine.create(
      { variant: body.variant, payload: body.payload, priority: body.priority, targetScope: body.targetScope },
      actor
    );
    res.status(201).json(created);
  });

  app.get('/api/v1/requests', async (req, res) => {
    actorIdFromRequest(req);
    res.status(200).json(await queries.search(parse(requestsQuery, req.query)));
  });

  app.get('/api/v1/requests/:requestId', async (req, res) => {
    actorIdFromRequest(req);
    res.status(200).json(await queries.getRequest(req.params.requestId));
  });

  app.post('/api/v1/requests/:requestId/approve', async (req, res) => {
    const actorId = actorIdFromRequest(req);
    const body = parse(approveBody, req.body);
    res.status(200).json(await engine.approve(req.params.requestId, actorId, body));
  });

  app.post('/api/v1/requests/:requestId/reject', async (req, res) => {
    const actorId = actorIdFromRequest(req);
    const body = parse(rejectBody, req.body);
    res.status(200).json(await engine.reject(req.params.requestId, actorId, body.reason));
  });

  app.post('/api/v1/requests/:requestId/cancel', async (req, res) => {
    const actorId = actorIdFromRequest(req);
    res.status(200).json(await engine.cancel(req.params.requestId, actorId));
  });

  app.post('/api/v1/requests/:requestId/complete', async (req, res) => {
    const actorId = actorIdFromRequest(req);
    res.status(200).json(await engine.complete(req.params.requestId, actorId));
  });

  app.post('/api/v1/requests/:requestId/reroute', async (req, res) => {
    actorIdFromRequest(req);
    res.status(200).json(await engine.reroute(req.params.requestId));
  });

  app.post('/api/v1/requests/:requestId/notes', async (req, res) => {
    const actorId = actorIdFromRequest(req);
    const body = parse(noteBody, req.body);
    res.status(201).json(await engine.addNote(req.params.requestId, actorId, body.note));
  });

  app.get('/api/v1/statistics', async (req, res) => {
    actorIdFromRequest(req);
    res.status(200).json(await queries.getStatistics());
  });

  app.get('/api/v1/sla', async (req, res) => {
    actorIdFromRequest(req);
    const query = parse(slaQuery, req.query);
    res.status(200).json(await queries.slaSweep(query.now ? new Date(query.now) : new Date()));
  });

  app.get('/api/v1/workload', (req, res) => {
    actorIdFromRequest(req);
    res.status(200).json(queries.workload());
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof DomainError) {
      if (error instanceof InvalidStateError || error instanceof AuthorizationError) {
        log('WARN', 'request refused', { path: req.originalUrl, code: error.code, reason: error.message });
      }
      res.status(error.statusCode).json({
        code: error.code,
        message: error.message,
        ...(error instanceof ValidationError ? { issues: error.issues } : {})
      });
      return;
    }
    if (isBodyParserError(error)) {
      res.status(error.status).json({ code: 'BAD_REQUEST', message: error.message });
      return;
    }
    log('ERROR', 'unhandled error', {
      path: req.originalUrl,
      error: error instanceof Error ? error.message : String(error)
    });
    res.status(500).json({ code: 'INTERNAL_ERROR', message: 'internal server error' });
  });

  return app;
}
