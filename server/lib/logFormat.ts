export interface LogBindings {
  module: string;
  source?: string;
}

export interface TaggedLine {
  bindings: LogBindings | null;
  message: string;
}

// `[module]` or `[module:source]` at the start of a console line.
const TAG_PATTERN = /^\[([A-Za-z][\w-]*)(?::([\w.-]+))?\]\s*/;

export function formatArgs(args: unknown[]): string {
  return args
    .map((a) => {
      if (a instanceof Error) return a.stack || a.message;
      if (typeof a === 'object' && a !== null) {
        try {
          return JSON.stringify(a);
        } catch {
          return String(a);
        }
      }
      return String(a);
    })
    .join(' ');
}

/**
 * Lifts the leading tag of a console line into pino bindings, so
 * `[scraper:earnings] Extracted 12 rows` logs `{ module: 'scraper', source: 'earnings' }`
 * with the message `Extracted 12 rows`. Untagged lines pass through unchanged.
 */
export function splitLogTag(line: string): TaggedLine {
  const match = TAG_PATTERN.exec(line);
  if (!match) return { bindings: null, message: line };
  const [tag, module, source] = match;
  const bindings: LogBindings = source ? { module, source } : { module };
  return { bindings, message: line.slice(tag.length) };
}

export function bindingsKey(bindings: LogBindings): string {
  return bindings.source ? `${bindings.module}:${bindings.source}` : bindings.module;
}
