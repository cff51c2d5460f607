// Caller supplied something malformed or out of range. Raised before any I/O.
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

// The referenced film does not exist. Match on the type, never the message.
export class FilmNotFoundError extends Error {
  constructor() {
    super("film not found");
    this.name = "FilmNotFoundError";
  }
}

// Anything the store threw, prefixed with what we were doing at the time.
export class DatabaseError extends Error {
  constructor(context: string, cause: unknown) {
    super(`${context}: ${messageOf(cause)}`, { cause });
    this.name = "DatabaseError";
  }
}

export function messageOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** True when `err` or anything on its `cause` chain is a FilmNotFoundError. */
export function isFilmNotFound(err: unknown): boolean {
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof FilmNotFoundError) return true;
    seen.add(current);
    current = current.cause;
  }
  return false;
}
