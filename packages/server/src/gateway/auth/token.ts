// packages/server/src/gateway/auth/token.ts
import type { IncomingMessage } from 'node:http';

export type TokenSource = 'query' | 'header' | 'bearer';

export interface ExtractedToken {
  readonly token: string;
  readonly source: TokenSource;
}

type RequestHead = Pick<IncomingMessage, 'url' | 'headers'>;

/**
 * 요청에서 세션 토큰 추출
 *
 * 우선순위: `?<queryParam>=` > `x-session-token` 헤더 > `Authorization: Bearer`
 * 빈 값은 없는 것으로 취급.
 */
export function extractSessionToken(req: RequestHead, queryParam = 'token'): ExtractedToken | undefined {
  const fromQuery = parseQuery(req.url).get(queryParam);
  if (fromQuery) {
    return { token: fromQuery, source: 'query' };
  }

  const fromHeader = firstHeader(req.headers['x-session-token']);
  if (fromHeader) {
    return { token: fromHeader, source: 'header' };
  }

  const authorization = req.headers.authorization;
  if (authorization?.startsWith('Bearer ')) {
    const bearer = authorization.slice(7).trim();
    if (bearer) {
      return { token: bearer, source: 'bearer' };
    }
  }

  return undefined;
}

/** 요청 URL의 pathname (query 제외). 파싱할 수 없는 요청 대상이면 undefined */
export function requestPath(url: string | undefined): string | undefined {
  return parseRequestUrl(url)?.pathname;
}

/** 파싱할 수 없는 요청 대상은 빈 query로 취급 */
export function parseQuery(url: string | undefined): URLSearchParams {
  return parseRequestUrl(url)?.searchParams ?? new URLSearchParams();
}

function parseRequestUrl(url: string | undefined): URL | undefined {
  try {
    return new URL(url ?? '/', 'http://localhost');
  } catch {
    return undefined;
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

/** 원격 IP (rate limit 키) */
export function clientIp(req: Pick<IncomingMessage, 'socket'>): string {
  return req.socket.remoteAddress ?? 'unknown';
}
