// packages/infra/src/runtime-guard.ts
const MINIMUM_NODE_VERSION = { major: 20, minor: 12 } as const;

/**
 * Node.js 버전 검증
 *
 * 20.12 미만이면 (process.loadEnvFile 부재) 에러 메시지 출력 후 process.exit(1).
 */
export function assertSupportedRuntime(version: string = process.versions.node): void {
  if (!isSupportedVersion(version)) {
    console.error(
      `chatwave requires Node.js ${MINIMUM_NODE_VERSION.major}.${MINIMUM_NODE_VERSION.minor} or later.\n` +
        `Current version: ${version}`,
    );
    process.exit(1);
  }
}

/** 버전 문자열이 최소 요구 버전 이상인지 */
export function isSupportedVersion(version: string): boolean {
  const [major = 0, minor = 0] = version.split('.').map(Number);
  if (major !== MINIMUM_NODE_VERSION.major) {
    return major > MINIMUM_NODE_VERSION.major;
  }
  return minor >= MINIMUM_NODE_VERSION.minor;
}
