/**
 * Raised when a record a workflow depends on does not exist.
 */
export class NotFoundError extends Error {
  readonly entity: string;
  readonly key: string;

  constructor(entity: string, key: string) {
    super(`${entity} not found: ${key}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.key = key;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
