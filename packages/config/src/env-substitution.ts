// packages/config/src/env-substitution.ts
import { MissingEnvVarError } from './errors.js';

/**
 * 환경변수 치환 엔진
 *
 * - `${VAR}`: 대문자 이름만, 미설정/빈 문자열이면 MissingEnvVarError
 * - `${VAR:-fallback}`: 미설정/빈 문자열이면 fallback 사용
 * - `$${VAR}`: 리터럴 `${VAR}` 출력
 * - 1회 치환 (치환 결과는 다시 해석하지 않음)
 */

const ENV_VAR_PATTERN = /(\$?)\$\{([A-Z_][A-Z0-9_]*)(?::-([^}]*))?\}/g;

export function resolveEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === 'string') {
    return substituteString(value, env);
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolveEnvVars(item, env));
  }
  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      result[k] = resolveEnvVars(v, env);
    }
    return result;
  }
  return value;
}

function substituteString(str: string, env: NodeJS.ProcessEnv): string {
  if (!str.includes('${')) {
    return str;
  }

  return str.replace(
    ENV_VAR_PATTERN,
    (match, escape: string, name: string, fallback: string | undefined) => {
      if (escape) {
        return match.slice(1);
      }
      const value = env[name];
      if (value !== undefined && value !== '') {
        return value;
      }
      if (fallback !== undefined) {
        return fallback;
      }
      throw new MissingEnvVarError(name);
    },
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' && value !== null && Object.getPrototypeOf(value) === Object.prototype
  );
}
