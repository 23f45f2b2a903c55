// packages/server/src/gateway/router.ts
import type { IncomingMessage, ServerResponse } from 'node:http';
import { ChatwaveError, getEventBus, isChatwaveError, runWithContext } from '@chatwave/infra';
import { randomUUID } from 'node:crypto';
import { z } from 'zod/v4';
import type { GatewayServerContext } from './context.js';
import type { GatewayStatus } from './types.js';
import { UpstreamUnavailableError } from '../errors.js';
import { clientIp, parseQuery, requestPath } from './auth/index.js';
import { handleCors } from './cors.js';

/** 요청 body 최대 크기 */
export const MAX_BODY_BYTES = 16 * 1024;

const STATUS_MESSAGE = 'Good Day! Everything is up and running :)';

interface Route {
  readonly method: string;
  readonly path: string;
  handler(req: IncomingMessage, res: ServerResponse, ctx: GatewayServerContext): Promise<void>;
}

const routes: Route[] = [
  { method: 'GET', path: '/status', handler: handleStatusRequest },
  { method: 'GET', path: '/health', handler: handleHealthRequest },
  { method: 'GET', path: '/auth/me', handler: handleMeRequest },
  { method: 'POST', path: '/auth/register', handler: handleRegisterRequest },
  { method: 'POST', path: '/auth/login', handler: handleLoginRequest },
  { method: 'POST', path: '/auth/logout', handler: handleLogoutRequest },
];

const CredentialsSchema = z.object({
  email: z.string().trim().min(1, 'email is required'),
  password: z.string().min(1, 'password is required'),
});

const RegisterSchema = CredentialsSchema.extend({
  displayName: z.string().trim().min(1).max(64).optional(),
});

const LogoutSchema = z.object({
  session_token: z.string().min(1).optional(),
});

/** HTTP 요청을 적절한 핸들러로 라우팅 */
export async function handleHttpRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayServerContext,
): Promise<void> {
  handleCors(req, res, ctx.config.gateway.cors);

  // CORS preflight (허용되지 않은 origin도 204로 끝낸다)
  if (req.method === 'OPTIONS') {
    if (!res.writableEnded) {
      res.writeHead(204);
      res.end();
    }
    return;
  }

  const path = requestPath(req.url);
  if (path === undefined) {
    sendJson(res, 400, { error: 'Bad Request' });
    return;
  }

  const basePath = ctx.config.gateway.basePath;
  const route = routes.find((r) => r.method === req.method && basePath + r.path === path);

  if (!route) {
    sendJson(res, 404, { error: 'Not Found' });
    return;
  }

  const requestId = randomUUID();
  await runWithContext({ requestId, startedAt: Date.now() }, async () => {
    try {
      await route.handler(req, res, ctx);
    } catch (err) {
      sendError(res, err, ctx);
    }
  });
}

/** GET /status */
async function handleStatusRequest(
  _req: IncomingMessage,
  res: ServerResponse,
  _ctx: GatewayServerContext,
): Promise<void> {
  sendJson(res, 200, { message: STATUS_MESSAGE });
}

/** GET /health — 헬스 체크 */
async function handleHealthRequest(
  _req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayServerContext,
): Promise<void> {
  const status: GatewayStatus = {
    status: 'ok',
    uptime: process.uptime(),
    connections: ctx.registry.size,
  };
  sendJson(res, 200, status);
}

/** GET /auth/me — `session-token` 또는 `x-session-token` 헤더의 세션 사용자 */
async function handleMeRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayServerContext,
): Promise<void> {
  const token = headerValue(req, 'session-token') ?? headerValue(req, 'x-session-token');
  const result = await ctx.identityResolver.resolve(token);

  if (!result.ok) {
    if (result.error.reason === 'upstream_unavailable') {
      throw new UpstreamUnavailableError('session store');
    }
    throw new ChatwaveError('Invalid or expired session', 'INVALID_SESSION', { statusCode: 401 });
  }

  sendJson(res, 200, { userId: result.value.userId, displayName: result.value.displayName });
}

/** POST /auth/register */
async function handleRegisterRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayServerContext,
): Promise<void> {
  const body = await readJsonBody(req, RegisterSchema);
  const uid = await ctx.identityProvider.createAccount(body.email, body.password);

  if (body.displayName) {
    const displayName = body.displayName;
    await callUpstream('session store', () => ctx.sessionStore.setUsername(uid, displayName));
  }

  getEventBus().emit('account:created', uid);
  sendJson(res, 201, { message: 'User created', uid });
}

/**
 * POST /auth/login
 *
 * 차단된 IP → 429 (Retry-After), 자격 증명 실패 → 401 + 실패 기록.
 * 성공 시 UUID 세션 토큰을 auth.sessionTtlSeconds 동안 저장한다.
 */
async function handleLoginRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayServerContext,
): Promise<void> {
  const ip = clientIp(req);
  if (ctx.rateLimiter.isBlocked(ip)) {
    const retryAfterSeconds = Math.max(1, Math.ceil(ctx.rateLimiter.retryAfterMs(ip) / 1000));
    getEventBus().emit('gateway:auth:failure', ip, 'rate_limited');
    res.setHeader('Retry-After', String(retryAfterSeconds));
    sendJson(res, 429, { error: 'Too many failed attempts' });
    return;
  }

  const body = await readJsonBody(req, CredentialsSchema);
  const identity = await ctx.identityProvider.verifyCredentials(body.email, body.password);

  if (!identity) {
    ctx.rateLimiter.recordFailure(ip);
    getEventBus().emit('gateway:auth:failure', ip, 'invalid_credentials');
    throw new ChatwaveError('Invalid credentials', 'INVALID_CREDENTIALS', { statusCode: 401 });
  }

  ctx.rateLimiter.recordSuccess(ip);
  const sessionToken = randomUUID();
  await callUpstream('session store', () =>
    ctx.sessionStore.set(sessionToken, identity.userId, ctx.config.auth.sessionTtlSeconds),
  );

  getEventBus().emit('session:issued', identity.userId);
  sendJson(res, 200, { session_token: sessionToken });
}

/** POST /auth/logout — query > x-session-token 헤더 > JSON body 순서로 토큰 조회 */
async function handleLogoutRequest(
  req: IncomingMessage,
  res: ServerResponse,
  ctx: GatewayServerContext,
): Promise<void> {
  let token = parseQuery(req.url).get('session_token') ?? headerValue(req, 'x-session-token');
  if (!token) {
    token = (await readJsonBody(req, LogoutSchema)).session_token;
  }

  if (!token) {
    throw new ChatwaveError('session_token is required', 'INVALID_REQUEST', { statusCode: 400 });
  }

  const sessionToken = token;
  await callUpstream('session store', () => ctx.sessionStore.delete(sessionToken));
  getEventBus().emit('session:revoked');
  sendJson(res, 200, { message: 'Logged out' });
}

// ── 유틸 ──

/** 요청 body 읽기 (스트리밍, 크기 제한) */
export function readBody(req: IncomingMessage, limit = MAX_BODY_BYTES): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    let rejected = false;

    req.on('data', (chunk: Buffer) => {
      if (rejected) {
        return;
      }
      size += chunk.length;
      if (size > limit) {
        rejected = true;
        reject(new ChatwaveError('Request body too large', 'PAYLOAD_TOO_LARGE', { statusCode: 413 }));
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => {
      if (!rejected) {
        resolve(Buffer.concat(chunks).toString('utf8'));
      }
    });
    req.on('error', reject);
  });
}

/** JSON body 파싱 + zod 검증. 빈 body는 `{}`로 취급. */
export async function readJsonBody<T>(req: IncomingMessage, schema: z.ZodType<T>): Promise<T> {
  const raw = await readBody(req);

  let parsed: unknown = {};
  if (raw.trim() !== '') {
    try {
      parsed = JSON.parse(raw);
    } catch {
      throw new ChatwaveError('Invalid JSON', 'INVALID_REQUEST', { statusCode: 400 });
    }
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) =>
        issue.path.length > 0 ? `${issue.path.map(String).join('.')}: ${issue.message}` : issue.message,
      )
      .join('; ');
    throw new ChatwaveError(message, 'INVALID_REQUEST', { statusCode: 400 });
  }
  return result.data;
}

/** 저장소 호출 실패를 UpstreamUnavailableError로 변환 */
async function callUpstream<T>(upstream: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (isChatwaveError(err)) {
      throw err;
    }
    throw new UpstreamUnavailableError(upstream, err);
  }
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first ? first : undefined;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function sendError(res: ServerResponse, err: unknown, ctx: GatewayServerContext): void {
  if (res.headersSent) {
    ctx.logger.error('Handler failed after response was sent', err);
    res.end();
    return;
  }

  if (isChatwaveError(err) && err.isOperational) {
    if (err.statusCode >= 500) {
      ctx.logger.warn(`${err.code}: ${err.message}`);
    }
    sendJson(res, err.statusCode, { error: err.message });
    return;
  }

  ctx.logger.error('Unhandled HTTP handler error', err);
  sendJson(res, 500, { error: 'Internal Server Error' });
}
