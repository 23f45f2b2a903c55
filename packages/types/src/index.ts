// @chatwave/types — barrel export
export type * from './common.js';
export type * from './chat.js';
export type * from './config.js';

// 런타임 값 (const enum 대체)
export { WS_CLOSE_CODES } from './chat.js';

// 브랜드 팩토리 함수
export { createTimestamp, createUserId, createConnectionId } from './common.js';
