// packages/infra/src/env.ts
const CHATWAVE_PREFIX = 'CHATWAVE_';

/** CHATWAVE_ 접두사 환경 변수의 빈 문자열을 undefined로 정규화 */
export function normalizeEnv(env: NodeJS.ProcessEnv = process.env): void {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(CHATWAVE_PREFIX)) {
      continue;
    }

    // 빈 문자열 → undefined 정규화
    if (value === '') {
      delete env[key];
    }
  }
}

/**
 * 환경 변수 조회
 *
 * CHATWAVE_ 접두사를 우선 검색하고, 없으면 접두사 없는 키를 검색.
 */
export function getEnv(
  key: string,
  fallback?: string,
  env: NodeJS.ProcessEnv = process.env,
): string | undefined {
  return env[`${CHATWAVE_PREFIX}${key}`] ?? env[key] ?? fallback;
}

/** 필수 환경 변수 조회 — 없으면 throw */
export function requireEnv(key: string): string {
  const value = getEnv(key);
  if (!value) {
    throw new Error(`Required environment variable not set: ${CHATWAVE_PREFIX}${key} or ${key}`);
  }
  return value;
}

/** truthy 환경 변수 판별 ('1', 'true', 'yes') */
export function isTruthyEnvValue(value: string | undefined): boolean {
  return value != null && ['1', 'true', 'yes'].includes(value.toLowerCase());
}
