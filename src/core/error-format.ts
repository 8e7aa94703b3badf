/*
Purpose: render errors as labelled lines for the terminal, with optional ANSI styling.
Assumptions: debug mode may include the underlying error chain and stack; non-TTY output disables color.
Usage: printErrorLines(formatErrorLines(err, { mode: "debug" }), createAnsiFormatter(resolveColorEnabled()));
*/

import { toUserFacingError } from "./error-mapping.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatOptions = {
  mode?: ErrorFormatMode;
};

export type ErrorFormatLineKind = "title" | "message" | "hint" | "next" | "code" | "cause" | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan" | "green";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

export type AnsiColorOptions = {
  stream?: { isTTY?: boolean };
  useColor?: boolean;
};

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_RESET = "\x1b[0m";

const ANSI_STYLES: Record<AnsiStyle, string> = {
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
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

export function resolveColorEnabled(options: AnsiColorOptions = {}): boolean {
  const stream = options.stream ?? process.stderr;
  const isTty = Boolean(stream.isTTY);

  if (options.useColor === undefined) {
    return isTty && !process.env.NO_COLOR;
  }

  return options.useColor && isTty;
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: ErrorFormatOptions = {},
): ErrorFormatLine[] {
  const mode = options.mode ?? "short";
  const userError = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: userError.title }];

  const message = userError.message.trim();
  if (message.length > 0 && message !== userError.title.trim()) {
    lines.push({ kind: "message", text: message });
  }
  if (userError.hint) {
    lines.push({ kind: "hint", text: userError.hint });
  }
  if (userError.next) {
    lines.push({ kind: "next", text: userError.next });
  }

  if (mode === "debug") {
    lines.push({ kind: "code", text: userError.code });

    for (const cause of collectCauses(userError.cause)) {
      const text = `${cause.name}: ${formatErrorMessage(cause)}`;
      if (formatErrorMessage(cause) !== message) {
        lines.push({ kind: "cause", text });
      }
    }

    const root = innermostError(userError);
    if (root.stack) {
      lines.push({ kind: "stack", text: root.stack });
    }
  }

  return lines;
}

export function printErrorLines(
  lines: ErrorFormatLine[],
  format: AnsiFormatter,
  write: (line: string) => void = (line) => console.error(line),
): void {
  for (const line of lines) {
    switch (line.kind) {
      case "title":
        write(format(`Error: ${line.text}`, ["bold", "red"]));
        break;
      case "hint":
        write(format(`Hint: ${line.text}`, ["yellow"]));
        break;
      case "next":
        write(format(`Next: ${line.text}`, ["cyan"]));
        break;
      case "code":
      case "cause":
      case "stack":
        write(format(`${line.kind}: ${line.text}`, ["dim"]));
        break;
      default:
        write(line.text);
    }
  }
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const message = error.message.trim();
    return message.length > 0 ? message : error.name;
  }

  if (typeof error === "string") {
    return error;
  }

  return String(error);
}

// =============================================================================
// INTERNALS
// =============================================================================

const MAX_CAUSE_DEPTH = 5;

function collectCauses(cause: unknown): Error[] {
  const chain: Error[] = [];
  let current = cause;

  while (current instanceof Error && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    current = current.cause;
  }

  return chain;
}

function innermostError(error: Error): Error {
  const chain = collectCauses(error.cause);
  return chain.length > 0 ? chain[chain.length - 1] : error;
}
