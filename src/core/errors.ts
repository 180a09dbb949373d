export type PatchErrorCode =
  | 'INVALID_CONFIG'
  | 'READ_FAILED'
  | 'WRITE_FAILED'
  | 'PATH_OUTSIDE_WORKDIR';

export class PatchError extends Error {
  readonly code: PatchErrorCode;
  readonly path?: string;

  constructor(code: PatchErrorCode, message: string, path?: string) {
    super(message);
    this.code = code;
    this.path = path;
    this.name = 'PatchError';
  }
}

export function assert(condition: unknown, code: PatchErrorCode, message: string): asserts condition {
  if (!condition) {
    throw new PatchError(code, message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
