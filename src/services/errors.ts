// Fatal preconditions are thrown as plain objects carrying a stable string code
// so entry points can map them to an exit status without instanceof checks.
export type PipelineFailureCode = 'NO_INPUT_FILES' | 'NO_URLS';

export interface PipelineFailureShape<TData extends Record<string, unknown> = Record<string, unknown>> {
  code: PipelineFailureCode;
  message: string;
  data: TData;
  __pipelineFailure: true;
}

export function fail<TData extends Record<string, unknown> = Record<string, unknown>>(code: PipelineFailureCode, message: string, data?: TData): never {
  const err: PipelineFailureShape<TData | Record<string, never>> = { code, message, data: data ?? {}, __pipelineFailure: true };
  // eslint-disable-next-line no-throw-literal
  throw err;
}

export function isPipelineFailure(e: unknown): e is PipelineFailureShape {
  if(!e || typeof e !== 'object') return false;
  const maybe = e as { code?: unknown; message?: unknown; __pipelineFailure?: unknown };
  return maybe.__pipelineFailure === true && typeof maybe.code === 'string' && typeof maybe.message === 'string';
}

/** Bad command-line input; entry points print usage and exit with status 2. */
export class UsageError extends Error {
  constructor(message: string){
    super(message);
    this.name = 'UsageError';
  }
}

export function describeError(e: unknown): string {
  if(e instanceof Error) return `${e.name || 'Error'}: ${e.message}`;
  if(isPipelineFailure(e)) return `${e.code}: ${e.message}`;
  if(typeof e === 'object' && e !== null){
    try { return JSON.stringify(e); } catch { return String(e); }
  }
  return String(e);
}
