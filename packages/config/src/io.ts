// packages/config/src/io.ts
import type { ChatwaveConfig, ResolvedChatwaveConfig } from '@chatwave/types';
import JSON5 from 'json5';
import * as fs from 'node:fs';
import type { ConfigCache, ConfigDeps } from './types.js';
import { createConfigCache } from './cache-utils.js';
import { applyDefaults } from './defaults.js';
import { applyEnvOverrides } from './env-overrides.js';
import { resolveEnvVars } from './env-substitution.js';
import { ConfigError } from './errors.js';
import { resolveConfigPath } from './paths.js';
import { validateConfig } from './validation.js';

/** ConfigIO — 설정 읽기 파사드 */
export interface ConfigIO {
  /** 5단계 파이프라인으로 설정 로드 */
  loadConfig(): ResolvedChatwaveConfig;
  /** 캐시 무효화 */
  invalidateCache(): void;
  /** 현재 설정 파일 경로 */
  readonly configPath: string;
}

/**
 * ConfigIO 팩토리
 *
 * 5단계 파이프라인:
 *   1. 파일 읽기 (JSON5, 없으면 {})
 *   2. 환경변수 치환 (${VAR})
 *   3. Zod 검증 — 실패 시 이슈를 경고하고 파일 내용 무시
 *   4. 기본값 적용
 *   5. 환경변수 오버라이드
 */
export function createConfigIO(deps: ConfigDeps = {}): ConfigIO {
  const fsModule = deps.fs ?? fs;
  const env = deps.env ?? process.env;
  const configPath = deps.configPath ?? resolveConfigPath(env);
  const logger = deps.logger;
  const cache: ConfigCache = createConfigCache(deps.cacheTtlMs);

  function readConfigFile(): unknown {
    let content: string;
    try {
      content = fsModule.readFileSync(configPath, 'utf-8');
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        logger?.debug(`Config file not found: ${configPath}, using defaults`);
        return {};
      }
      throw new ConfigError(`Failed to read config: ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    try {
      return JSON5.parse(content);
    } catch (err) {
      throw new ConfigError(`Invalid config: cannot parse ${configPath}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }
  }

  function loadConfig(): ResolvedChatwaveConfig {
    const cached = cache.get();
    if (cached) {
      return cached;
    }

    // 1. 파일 읽기
    const raw = readConfigFile();

    // 2. 환경변수 치환
    const substituted = resolveEnvVars(raw, env);

    // 3. Zod 검증
    const { valid, config: validated, issues } = validateConfig(substituted);
    if (!valid) {
      for (const issue of issues) {
        logger?.warn(`Config issue [${issue.path}]: ${issue.message}`);
      }
      logger?.warn(`Ignoring invalid config file: ${configPath}`);
    }
    const userConfig: ChatwaveConfig = valid ? validated : {};

    // 4. 기본값 적용
    const withDefaults = applyDefaults(userConfig);

    // 5. 환경변수 오버라이드
    const final = applyEnvOverrides(withDefaults, env);

    cache.set(final);
    return final;
  }

  return {
    loadConfig,
    invalidateCache: () => cache.invalidate(),
    get configPath() {
      return configPath;
    },
  };
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

// ─── 모듈 레벨 래퍼 (편의) ───

let defaultIO: ConfigIO | null = null;
let defaultDeps: ConfigDeps | undefined;

/**
 * 기본 ConfigIO로 설정 로드 (싱글턴).
 * deps가 이전 호출과 다르면 내부 IO를 재생성한다.
 */
export function loadConfig(deps?: ConfigDeps): ResolvedChatwaveConfig {
  if (!defaultIO || (deps && deps !== defaultDeps)) {
    defaultDeps = deps;
    defaultIO = createConfigIO(deps);
  }
  return defaultIO.loadConfig();
}

/** 기본 ConfigIO 캐시 초기화 */
export function clearConfigCache(): void {
  defaultIO?.invalidateCache();
  defaultIO = null;
  defaultDeps = undefined;
}
