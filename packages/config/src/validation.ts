// packages/config/src/validation.ts
import type { ChatwaveConfig, ConfigValidationIssue } from '@chatwave/types';
import { z } from 'zod/v4';
import { ConfigValidationError } from './errors.js';
import { ChatwaveConfigSchema } from './zod-schema.js';

export interface ValidationResult {
  valid: boolean;
  config: ChatwaveConfig;
  issues: ConfigValidationIssue[];
}

/**
 * Zod 기반 검증
 *
 * 실패 시 z.treeifyError()로 이슈를 경로별로 수집하고 빈 {}를 돌려준다.
 */
export function validateConfig(raw: unknown): ValidationResult {
  const result = ChatwaveConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data, issues: [] };
  }

  const tree = z.treeifyError(result.error) as unknown as ErrorTree;
  const issues = collectIssues(tree);
  return { valid: false, config: {}, issues };
}

/** 검증 실패 시 에러를 throw하는 strict 버전 */
export function validateConfigStrict(raw: unknown): ChatwaveConfig {
  const { valid, config, issues } = validateConfig(raw);
  if (!valid) {
    throw new ConfigValidationError(
      `Config validation failed: ${issues.map((i) => `${i.path}: ${i.message}`).join('; ')}`,
      { issues },
    );
  }
  return config;
}

/** treeifyError 반환 구조 (zod v4 $ZodErrorTree 호환) */
interface ErrorTree {
  errors: string[];
  properties?: { [key: string]: ErrorTree | undefined };
  items?: (ErrorTree | undefined)[];
}

/** z.treeifyError 결과를 ConfigValidationIssue[]로 평탄화 */
function collectIssues(tree: ErrorTree, path = ''): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  for (const message of tree.errors) {
    issues.push({ path: path || '(root)', message, severity: 'error' });
  }

  for (const [key, subtree] of Object.entries(tree.properties ?? {})) {
    if (subtree) {
      issues.push(...collectIssues(subtree, path ? `${path}.${key}` : key));
    }
  }

  (tree.items ?? []).forEach((subtree, index) => {
    if (subtree) {
      issues.push(...collectIssues(subtree, `${path}[${index}]`));
    }
  });

  return issues;
}
