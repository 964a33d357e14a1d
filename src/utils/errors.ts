// =====================================================
// Reportable Error Classes
// =====================================================
// Errors carrying the metadata the reporter attaches to Sentry events.
// Classification helpers walk the `cause` chain so wrapped errors keep
// the tags, extras and ignorable flag of what they wrap.

export type Tags = Record<string, string>;
export type Extras = Record<string, unknown>;

export interface ReportableErrorOptions {
  tags?: Tags;
  extras?: Extras;
  ignorable?: boolean;
  cause?: unknown;
}

export class ReportableError extends Error {
  public readonly tags: Tags;
  public readonly extras: Extras;
  public readonly ignorable: boolean;

  constructor(message: string, options: ReportableErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.tags = { ...options.tags };
    this.extras = { ...options.extras };
    this.ignorable = options.ignorable ?? false;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Expected failure (bad input, client disconnects, not-found lookups).
 * Logged locally, never sent to Sentry.
 */
export class IgnorableError extends ReportableError {
  constructor(message: string, options: Omit<ReportableErrorOptions, 'ignorable'> = {}) {
    super(message, { ...options, ignorable: true });
  }
}

// ===========================================
// Classification
// ===========================================

const MAX_CAUSE_DEPTH = 32;

/**
 * Yields the error followed by each nested `cause`, outermost first.
 * Stops on cycles and after MAX_CAUSE_DEPTH links.
 */
function* causeChain(error: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current !== undefined && current !== null && !seen.has(current) && seen.size < MAX_CAUSE_DEPTH) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

function reportableChain(error: unknown): ReportableError[] {
  const chain: ReportableError[] = [];
  for (const link of causeChain(error)) {
    if (link instanceof ReportableError) {
      chain.push(link);
    }
  }
  return chain;
}

export function isIgnorable(error: unknown): boolean {
  return reportableChain(error).some((link) => link.ignorable);
}

export function tagsOf(error: unknown): Tags {
  // Inner links first so the outermost error wins on conflicting keys
  return reportableChain(error)
    .reverse()
    .reduce<Tags>((tags, link) => ({ ...tags, ...link.tags }), {});
}

/**
 * Diagnostic payload for the error, including the stack of the innermost
 * reportable error. Undefined when nothing in the chain is reportable.
 */
export function extrasOf(error: unknown): Extras | undefined {
  const chain = reportableChain(error);
  if (!chain.length) {
    return undefined;
  }

  const innermost = chain[chain.length - 1];
  const extras = [...chain]
    .reverse()
    .reduce<Extras>((merged, link) => ({ ...merged, ...link.extras }), {});

  return { ...extras, stacktrace: innermost.stack };
}

/** Message of an Error, otherwise the value as a string. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
