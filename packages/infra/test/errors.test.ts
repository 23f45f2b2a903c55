import { describe, it, expect } from 'vitest';
import {
  ChatwaveError,
  PortInUseError,
  isChatwaveError,
  wrapError,
  extractErrorInfo,
} from '../src/errors.js';

describe('ChatwaveError', () => {
  it('기본값으로 생성된다', () => {
    const err = new ChatwaveError('test', 'TEST_CODE');
    expect(err.message).toBe('test');
    expect(err.code).toBe('TEST_CODE');
    expect(err.statusCode).toBe(500);
    expect(err.isOperational).toBe(true);
    expect(err.name).toBe('ChatwaveError');
  });

  it('옵션으로 커스터마이징된다', () => {
    const cause = new Error('root');
    const err = new ChatwaveError('test', 'CODE', {
      statusCode: 400,
      isOperational: false,
      cause,
      details: { key: 'value' },
    });
    expect(err.statusCode).toBe(400);
    expect(err.isOperational).toBe(false);
    expect(err.cause).toBe(cause);
    expect(err.details).toEqual({ key: 'value' });
  });

  it('Error를 상속한다', () => {
    const err = new ChatwaveError('test', 'CODE');
    expect(err).toBeInstanceOf(Error);
    expect(err.stack).toBeDefined();
  });
});

describe('PortInUseError', () => {
  it('포트 정보를 포함한다', () => {
    const err = new PortInUseError(8080, 'node');
    expect(err.code).toBe('PORT_IN_USE');
    expect(err.message).toBe('Port 8080 is already in use by node');
    expect(err.details).toEqual({ port: 8080, occupiedBy: 'node' });
  });

  it('occupiedBy 없이 생성 가능하다', () => {
    expect(new PortInUseError(3000).message).toBe('Port 3000 is already in use');
  });
});

describe('isChatwaveError', () => {
  it('하위 클래스에도 true', () => {
    expect(isChatwaveError(new PortInUseError(1))).toBe(true);
  });

  it('일반 Error에 false', () => {
    expect(isChatwaveError(new Error('test'))).toBe(false);
    expect(isChatwaveError('string')).toBe(false);
  });
});

describe('wrapError', () => {
  it('Error cause를 보존한다', () => {
    const cause = new Error('inner');
    const err = wrapError('outer', 'WRAPPED', cause);
    expect(err.code).toBe('WRAPPED');
    expect(err.cause).toBe(cause);
  });

  it('non-Error cause를 Error로 변환한다', () => {
    const err = wrapError('outer', 'WRAPPED', 'boom');
    expect(err.cause).toBeInstanceOf(Error);
    expect(err.cause instanceof Error && err.cause.message).toBe('boom');
  });
});

describe('extractErrorInfo', () => {
  it('ChatwaveError에서 code와 cause를 추출한다', () => {
    const info = extractErrorInfo(wrapError('outer', 'WRAPPED', new Error('inner')));
    expect(info.code).toBe('WRAPPED');
    expect(info.message).toBe('outer');
    expect(info.isOperational).toBe(true);
    expect(info.cause).toBe('inner');
  });

  it('일반 Error는 UNKNOWN 코드', () => {
    const info = extractErrorInfo(new Error('plain'));
    expect(info.code).toBe('UNKNOWN');
    expect(info.message).toBe('plain');
  });

  it('non-Error 값은 문자열화된다', () => {
    expect(extractErrorInfo(42)).toEqual({ code: 'UNKNOWN', message: '42' });
  });
});
