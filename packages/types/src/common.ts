/** 브랜드 타입 -- 원시 타입에 의미론적 구분 부여 */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/** 결과 타입 -- 에러 핸들링의 명시적 표현 */
export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/** 깊은 부분 타입 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends object ? DeepPartial<T[P]> : T[P];
};

/** 깊은 필수 타입 -- 기본값 적용이 끝난 설정에 사용 (배열은 그대로) */
export type DeepRequired<T> = {
  [P in keyof T]-?: NonNullable<T[P]> extends readonly unknown[]
    ? NonNullable<T[P]>
    : NonNullable<T[P]> extends object
      ? DeepRequired<NonNullable<T[P]>>
      : NonNullable<T[P]>;
};

/** 타임스탬프 (밀리초 Unix epoch) */
export type Timestamp = Brand<number, 'Timestamp'>;

/** 사용자 ID (identity provider 발급) */
export type UserId = Brand<string, 'UserId'>;

/** 연결 ID (게이트웨이가 admission 시 발급) */
export type ConnectionId = Brand<string, 'ConnectionId'>;

/**
 * 비동기 정리 함수 -- TC39 `Symbol.asyncDispose`와 이름 충돌 방지를 위해
 * `AsyncDisposable` 대신 `CleanupFn`으로 명명.
 */
export type CleanupFn = () => Promise<void>;

/** 로그 레벨 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** 브랜드 타입 팩토리 */
export function createTimestamp(ms: number): Timestamp {
  return ms as Timestamp;
}

export function createUserId(id: string): UserId {
  return id as UserId;
}

export function createConnectionId(id: string): ConnectionId {
  return id as ConnectionId;
}
