/*
Purpose: turn any thrown value into printable CLI lines, with optional ANSI styling.
Assumptions: debug mode adds codes, the cause chain and a stack; color is off for non-TTY streams and under NO_COLOR.
Usage: renderErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(resolveColorEnabled({ stream }))).
*/

import { USER_FACING_ERROR_CODES, toUserFacingError, type UserFacingErrorInput } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "detail"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "green" | "yellow" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
  env?: Partial<Record<string, string | undefined>>;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value: string, styles: AnsiStyle[] = []): string => {
    if (!enabled || styles.length === 0) {
      return value;
    }

    const prefix = styles.map((style) => ANSI_STYLES[style]).join("");
    return `${prefix}${value}${ANSI_RESET}`;
  };
}

// NO_COLOR wins over everything; FORCE_COLOR turns color on without a TTY.
export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const env = options.env ?? {};
  if (env.NO_COLOR !== undefined && env.NO_COLOR !== "") return false;
  if (options.useColor === false) return false;

  const forced = env.FORCE_COLOR;
  if (forced !== undefined && forced !== "" && forced !== "0") return true;

  const stream = options.stream ?? process.stderr;
  return Boolean(stream.isTTY);
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

const DEFAULT_ERROR_TITLE = "Unexpected error";
const DEFAULT_ERROR_MESSAGE = "An unexpected error occurred.";
const MAX_CAUSE_DEPTH = 5;

export function formatErrorLines(error: unknown, options: ErrorFormatOptions = {}): ErrorFormatLine[] {
  const normalized = normalizeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: normalized.title }];

  if (normalized.message !== normalized.title) {
    lines.push({ kind: "message", text: normalized.message });
  }
  for (const detail of normalized.details ?? []) {
    lines.push({ kind: "detail", text: detail });
  }
  if (normalized.hint) {
    lines.push({ kind: "hint", text: normalized.hint });
  }
  if (normalized.next) {
    lines.push({ kind: "next", text: normalized.next });
  }

  if ((options.mode ?? "short") === "short") {
    return lines;
  }

  lines.push({ kind: "code", text: normalized.code });
  const root = normalized.cause instanceof Error ? normalized.cause : error;
  if (root instanceof Error) {
    lines.push({ kind: "name", text: root.name });
  }
  for (const message of causeChain(normalized.cause, normalized.message)) {
    lines.push({ kind: "cause", text: message });
  }
  if (root instanceof Error && root.stack) {
    lines.push({ kind: "stack", text: root.stack });
  }

  return lines;
}

const LINE_STYLES: Partial<Record<ErrorFormatLineKind, AnsiStyle[]>> = {
  title: ["bold", "red"],
  hint: ["yellow"],
  next: ["cyan"],
  code: ["dim"],
  name: ["dim"],
  cause: ["dim"],
  stack: ["dim"],
};

const LINE_PREFIXES: Partial<Record<ErrorFormatLineKind, string>> = {
  detail: "  - ",
  hint: "Hint: ",
  next: "Next: ",
  code: "Code: ",
  name: "Error: ",
  cause: "Caused by: ",
};

export function renderErrorLines(lines: ErrorFormatLine[], format: AnsiFormatter): string[] {
  return lines.map((line) => format(`${LINE_PREFIXES[line.kind] ?? ""}${line.text}`, LINE_STYLES[line.kind]));
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message.trim() || error.name;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
    return error.message.trim();
  }
  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizeError(error: unknown): UserFacingErrorInput {
  const mapped = toUserFacingError(error);
  if (mapped) {
    return {
      code: mapped.code,
      title: textOr(mapped.title, DEFAULT_ERROR_TITLE),
      message: textOr(mapped.message, DEFAULT_ERROR_MESSAGE),
      hint: optionalText(mapped.hint),
      next: optionalText(mapped.next),
      details: mapped.details.map((detail) => detail.trim()).filter((detail) => detail.length > 0),
      cause: mapped.cause,
    };
  }

  const message = error === null || error === undefined ? "" : formatErrorMessage(error);
  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: DEFAULT_ERROR_TITLE,
    message: textOr(message, DEFAULT_ERROR_MESSAGE),
    cause: error instanceof Error ? error.cause : undefined,
  };
}

// Messages of nested causes, skipping repeats of what is already printed.
function causeChain(cause: unknown, message: string): string[] {
  const seen = new Set<string>([message]);
  const messages: string[] = [];
  let current = cause;

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current !== undefined && current !== null; depth += 1) {
    const text = formatErrorMessage(current).trim();
    if (text && !seen.has(text)) {
      messages.push(text);
      seen.add(text);
    }
    current = current instanceof Error ? current.cause : undefined;
  }

  return messages;
}

function textOr(value: string, fallback: string): string {
  return optionalText(value) ?? fallback;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
