/**
 * Fatal problem with the audit's inputs. Thrown before any result exists.
 */
export class AuditConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unreadable or malformed nav config, a broken `!include`, or an include cycle */
export class NavConfigError extends AuditConfigError {}

/** Unreadable help index header */
export class HelpIndexError extends AuditConfigError {}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
