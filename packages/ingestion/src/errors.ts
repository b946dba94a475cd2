/**
 * No stable listing ID could be derived: no native ID candidate and no usable
 * source URL. Fatal for that listing only.
 */
export class IdentityError extends Error {
  readonly sourceUrl: string | null;

  constructor(message: string, sourceUrl: string | null) {
    super(message);
    this.name = 'IdentityError';
    this.sourceUrl = sourceUrl;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
