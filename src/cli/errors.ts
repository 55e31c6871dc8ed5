import { RaglineError } from '../domain/errors/DomainErrors.js';

/** CLI 錯誤訊息：domain 錯誤附上 code */
export function formatCliError(err: unknown): string {
  if (err instanceof RaglineError) return `Error [${err.code}]: ${err.message}`;
  if (err instanceof Error) return `Error: ${err.message}`;
  return 'Error: Unknown error';
}
