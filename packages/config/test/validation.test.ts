// packages/config/test/validation.test.ts
import { describe, it, expect } from 'vitest';
import { ConfigValidationError } from '../src/errors.js';
import { validateConfig, validateConfigStrict } from '../src/validation.js';

describe('validateConfig', () => {
  it('유효한 설정에 valid: true를 반환한다', () => {
    const result = validateConfig({ gateway: { port: 8080 } });
    expect(result.valid).toBe(true);
    expect(result.issues).toHaveLength(0);
    expect(result.config).toEqual({ gateway: { port: 8080 } });
  });

  it('빈 객체에 valid: true를 반환한다', () => {
    expect(validateConfig({}).valid).toBe(true);
  });

  it('알 수 없는 키에 valid: false와 빈 config를 반환한다', () => {
    const result = validateConfig({ gatway: {} });
    expect(result.valid).toBe(false);
    expect(result.config).toEqual({});
    expect(result.issues[0]?.path).toBe('(root)');
    expect(result.issues[0]?.severity).toBe('error');
  });

  it('중첩된 에러의 경로를 포함한다', () => {
    const result = validateConfig({ ws: { maxConnections: 0 } });
    expect(result.valid).toBe(false);
    expect(result.issues.map((i) => i.path)).toEqual(['ws.maxConnections']);
  });

  it('배열 항목 에러는 인덱스 경로를 갖는다', () => {
    const result = validateConfig({ gateway: { cors: { origins: ['*', 42] } } });
    expect(result.issues.map((i) => i.path)).toEqual(['gateway.cors.origins[1]']);
  });
});

describe('validateConfigStrict', () => {
  it('유효한 설정에 config를 반환한다', () => {
    expect(validateConfigStrict({ logging: { level: 'debug' } })).toEqual({
      logging: { level: 'debug' },
    });
  });

  it('잘못된 설정에 ConfigValidationError를 throw한다', () => {
    expect(() => validateConfigStrict({ sessionStore: { driver: 'mongo' } })).toThrow(
      ConfigValidationError,
    );
  });
});
