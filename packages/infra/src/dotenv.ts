// packages/infra/src/dotenv.ts

/**
 * .env 파일 로딩 — process.loadEnvFile() 사용 (Node.js 20.12+)
 *
 * 파일이 없으면 false. 읽기 권한 등 그 외 오류는 그대로 던진다.
 * 이미 설정된 환경변수는 덮어쓰지 않는다.
 */
export function loadDotenv(envPath?: string): boolean {
  try {
    process.loadEnvFile(envPath);
    return true;
  } catch (err) {
    if (isMissingFile(err)) {
      return false;
    }
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
