const PRETTY_PRINT_BANNER = "Pretty-print";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readPath(root: unknown, path: ReadonlyArray<string>): unknown {
  let current = root;
  for (const key of path) {
    if (!isRecord(current) || !(key in current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Parses a device response body that is supposed to be JSON.
 *
 * Some firmware wraps the document in an HTML "Pretty-print" viewer or
 * surrounds it with markup. The banner is stripped first; if that still
 * does not parse, the text between the first `{` and the last `}` is tried.
 * Returns `undefined` when nothing parses.
 */
export function parseTolerantJson(body: string): unknown {
  let content = body;
  if (content.trim().startsWith(PRETTY_PRINT_BANNER) && content.includes("{")) {
    content = content.slice(content.indexOf("{"));
  }

  const direct = tryParse(content);
  if (direct !== undefined) {
    return direct;
  }

  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return undefined;
  }
  return tryParse(content.slice(start, end + 1));
}
