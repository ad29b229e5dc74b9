/** The input document is missing, unreadable or not a PDF. Fatal for the session. */
export class DocumentLoadError extends Error {
  constructor(
    readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DocumentLoadError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
