export type DebugLevel = "off" | "parse" | "decode";

const LINE_SPLIT_REGEX = /\r?\n/;

function normalizeBooleanString(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return;
}

export function getDebugLevel(): DebugLevel {
  const envVal =
    (typeof process !== "undefined" &&
      process.env &&
      process.env.DEBUG_TJSON) ||
    "off";
  const envLower = String(envVal).toLowerCase();
  if (envLower === "parse" || envLower === "decode" || envLower === "off") {
    return envLower;
  }
  if (envLower === "2") {
    return "decode";
  }
  if (normalizeBooleanString(envLower) === true) {
    return "parse";
  }
  return "off";
}

function color(code: number) {
  return (text: string) => `\u001b[${code}m${text}\u001b[0m`;
}

// ANSI color codes
const ANSI_GRAY = 90;
const ANSI_YELLOW = 33;
const ANSI_CYAN = 36;
const ANSI_BG_BLUE = 44;

const cGray = color(ANSI_GRAY);
const cYellow = color(ANSI_YELLOW);
const cCyan = color(ANSI_CYAN);
const cBgBlue = color(ANSI_BG_BLUE);

const MAX_SNIPPET_LENGTH = 800;

function formatError(error: unknown): string {
  if (error instanceof Error) {
    const stack = error.stack ? `\n${error.stack}` : "";
    return `\n${error.name}: ${error.message}${stack}`;
  }
  return `\n${String(error)}`;
}

function truncateSnippet(snippet: string): string {
  if (snippet.length <= MAX_SNIPPET_LENGTH) {
    return snippet;
  }
  return `${snippet.slice(0, MAX_SNIPPET_LENGTH)}\n…[truncated ${snippet.length - MAX_SNIPPET_LENGTH} chars]`;
}

/**
 * Parse failures are printed at levels "parse" and "decode"
 */
export function logParseFailure({
  phase,
  reason,
  snippet,
  error,
}: {
  phase: "parse" | "stream" | string;
  reason: string;
  snippet?: string;
  error?: unknown;
}) {
  if (getDebugLevel() === "off") {
    return;
  }

  const label = cBgBlue(`[${phase}]`);
  console.log(cGray("[debug:tjson:fail]"), label, cYellow(reason));

  if (snippet) {
    const formatted = truncateSnippet(snippet)
      .split(LINE_SPLIT_REGEX)
      .map((line) => `  ${line}`)
      .join("\n");
    console.log(cGray("[debug:tjson:fail:snippet]"), `\n${formatted}`);
  }

  if (error) {
    console.log(cGray("[debug:tjson:fail:error]"), cCyan(formatError(error)));
  }
}

export function logDecodeFailure({
  source,
  destination,
  error,
}: {
  source: string;
  destination: string;
  error: unknown;
}) {
  console.log(
    cGray("[debug:tjson:decode]"),
    cBgBlue(`[${source} -> ${destination}]`),
    cCyan(formatError(error))
  );
}

export function logEmbeddingCycle(struct: string, field: string) {
  if (getDebugLevel() === "off") {
    return;
  }
  console.log(
    cGray("[debug:tjson:fields]"),
    cYellow(`embedding cycle skipped at ${struct}.${field}`)
  );
}
