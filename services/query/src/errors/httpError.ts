export class HttpError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export function badRequest(message: string, details?: unknown): HttpError {
  return new HttpError(400, 'bad_request', message, details);
}

function readField(value: object, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(value, key) ? Reflect.get(value, key) : undefined;
}

export function toHttpError(err: unknown): HttpError | null {
  if (err instanceof HttpError) {
    return err;
  }
  if (err && typeof err === 'object' && 'statusCode' in err && 'code' in err) {
    const statusCode = readField(err, 'statusCode');
    const code = readField(err, 'code');
    const message = err instanceof Error ? err.message : readField(err, 'message');
    return new HttpError(
      typeof statusCode === 'number' ? statusCode : 500,
      typeof code === 'string' ? code : 'unknown_error',
      typeof message === 'string' ? message : 'Unknown error',
      readField(err, 'details')
    );
  }
  return null;
}
