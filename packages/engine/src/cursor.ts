/**
 * Continuation token issued by a paginated source.
 *
 * Callers can only hold and pass it back; the source that issued the token
 * is the only code that reads it, through `toQueryValue()`.
 */
export class PageCursor {
  private constructor(private readonly token: string) {}

  /** Wraps a raw token; empty or missing tokens mean "no next page". */
  static from(token: string | null | undefined): PageCursor | null {
    return token ? new PageCursor(token) : null;
  }

  toQueryValue(): string {
    return this.token;
  }

  toString(): string {
    return 'PageCursor(<opaque>)';
  }

  toJSON(): string {
    return this.toString();
  }
}
