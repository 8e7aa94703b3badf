/*
Purpose: read and write the inline metadata block at the top of a script (`# /// script` ... `# ///`).
Assumptions: the block starts on the first line; values are TOML strings or arrays of strings.
Usage: const { header, body, problem } = decodeScript(text); encodeScript(header, body).
*/

// =============================================================================
// TYPES
// =============================================================================

export type HeaderExtraField = {
  /** Key name, or the table name for `[table]` sections. */
  key: string;
  /** Block lines with the comment prefix removed, exactly as read. */
  lines: string[];
};

export type DependencyHeader = {
  description: string | null;
  dependencies: string[];
  runtimeConstraint: string | null;
  authors: string[];
  createdDate: string | null;
  tags: string[];
  extraFields: HeaderExtraField[];
};

export type DecodedScript = {
  header: DependencyHeader | null;
  body: string;
  /** Set when a block was present but could not be read; header is null then. */
  problem?: string;
};

export const HEADER_OPEN = "# /// script";
export const HEADER_CLOSE = "# ///";

const STRING_KEYS = {
  description: "description",
  date: "createdDate",
  "requires-python": "runtimeConstraint",
} as const;

const LIST_KEYS = {
  authors: "authors",
  dependencies: "dependencies",
  tags: "tags",
} as const;

type StringKey = keyof typeof STRING_KEYS;
type ListKey = keyof typeof LIST_KEYS;

export function emptyHeader(): DependencyHeader {
  return {
    description: null,
    dependencies: [],
    runtimeConstraint: null,
    authors: [],
    createdDate: null,
    tags: [],
    extraFields: [],
  };
}

// =============================================================================
// DECODE
// =============================================================================

export function decodeScript(text: string): DecodedScript {
  const normalized = text.replace(/\r\n/g, "\n");
  const lines = normalized.split("\n");

  if (lines[0]?.trimEnd() !== HEADER_OPEN) {
    return { header: null, body: text };
  }

  const closeIndex = lines.findIndex((line, index) => index > 0 && line.trimEnd() === HEADER_CLOSE);
  if (closeIndex < 0) {
    return { header: null, body: text, problem: "opening marker without a closing `# ///` line" };
  }

  const content: string[] = [];
  for (let i = 1; i < closeIndex; i += 1) {
    const stripped = stripCommentPrefix(lines[i]);
    if (stripped === null) {
      return { header: null, body: text, problem: `line ${i + 1} is missing the "#" prefix` };
    }
    content.push(stripped);
  }

  const parsed = parseBlock(content);
  if (typeof parsed === "string") {
    return { header: null, body: text, problem: parsed };
  }

  const body = lines
    .slice(closeIndex + 1)
    .join("\n")
    .replace(/^\n+/, "");

  return { header: parsed, body };
}

export function readHeader(text: string): DependencyHeader {
  return decodeScript(text).header ?? emptyHeader();
}

function stripCommentPrefix(line: string): string | null {
  const trimmed = line.trimEnd();
  if (trimmed === "#") return "";
  if (trimmed.startsWith("# ")) return trimmed.slice(2);
  return null;
}

function parseBlock(content: string[]): DependencyHeader | string {
  const header = emptyHeader();
  const seen = new Set<string>();
  let index = 0;

  while (index < content.length) {
    const line = content[index];
    const trimmed = line.trim();

    if (trimmed.length === 0 || trimmed.startsWith("#")) {
      index += 1;
      continue;
    }

    // A table header swallows the rest of the block; its keys belong to the table.
    const table = /^\[\[?\s*([^\]]+?)\s*\]\]?$/.exec(trimmed);
    if (table) {
      header.extraFields.push({ key: table[1], lines: content.slice(index) });
      break;
    }

    const assignment = /^([A-Za-z0-9_.-]+)\s*=\s*(.*)$/.exec(trimmed);
    if (!assignment) {
      return `cannot read "${trimmed}"`;
    }

    const key = assignment[1];
    const valueLines = [assignment[2]];
    let end = index;

    if (assignment[2].startsWith("[") && !arrayIsClosed(assignment[2])) {
      let closed = false;
      while (end + 1 < content.length) {
        end += 1;
        valueLines.push(content[end]);
        if (arrayIsClosed(valueLines.join("\n"))) {
          closed = true;
          break;
        }
      }
      if (!closed) {
        return `array for "${key}" is never closed`;
      }
    }

    if (isStringKey(key) || isListKey(key)) {
      if (seen.has(key)) {
        return `"${key}" is defined twice`;
      }
      seen.add(key);

      const value = parseValue(valueLines.join("\n"));
      if (value === null) {
        return `value of "${key}" is not a string or an array of strings`;
      }

      if (isStringKey(key)) {
        if (typeof value !== "string") return `"${key}" must be a string`;
        header[STRING_KEYS[key]] = value;
      } else {
        if (!Array.isArray(value)) return `"${key}" must be an array of strings`;
        header[LIST_KEYS[key]] = value;
      }
    } else {
      header.extraFields.push({ key, lines: content.slice(index, end + 1) });
    }

    index = end + 1;
  }

  return header;
}

function isStringKey(key: string): key is StringKey {
  return Object.prototype.hasOwnProperty.call(STRING_KEYS, key);
}

function isListKey(key: string): key is ListKey {
  return Object.prototype.hasOwnProperty.call(LIST_KEYS, key);
}

/** True once every `[` outside strings and comments has its `]`. */
function arrayIsClosed(source: string): boolean {
  let depth = 0;
  let quote: string | null = null;

  for (let pos = 0; pos < source.length; pos += 1) {
    const char = source[pos];

    if (quote) {
      if (char === "\\" && quote === '"') {
        pos += 1;
      } else if (char === quote || char === "\n") {
        quote = null;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "#") {
      const newline = source.indexOf("\n", pos);
      if (newline < 0) break;
      pos = newline;
    } else if (char === "[") {
      depth += 1;
    } else if (char === "]") {
      depth -= 1;
    }
  }

  return depth <= 0;
}

// =============================================================================
// VALUE PARSING
// =============================================================================

function parseValue(source: string): string | string[] | null {
  const trimmed = stripTrailingComment(source.trim());

  if (trimmed.startsWith("[")) {
    return tokenizeArray(trimmed);
  }

  const parsed = readString(trimmed, 0);
  if (!parsed || parsed.end !== trimmed.length) {
    return null;
  }
  return parsed.value;
}

function stripTrailingComment(source: string): string {
  if (source.startsWith("[")) return source;
  const parsed = readString(source, 0);
  if (!parsed) return source;
  const rest = source.slice(parsed.end).trim();
  return rest.length === 0 || rest.startsWith("#") ? source.slice(0, parsed.end) : source;
}

/** Parses `[ "a", 'b', ]` (possibly multi-line, with comments). Null when unfinished or invalid. */
function tokenizeArray(source: string): string[] | null {
  const values: string[] = [];
  let pos = source.indexOf("[") + 1;
  let expectValue = true;

  while (pos < source.length) {
    const char = source[pos];

    if (char === " " || char === "\t" || char === "\n") {
      pos += 1;
      continue;
    }
    if (char === "#") {
      const newline = source.indexOf("\n", pos);
      if (newline < 0) return null;
      pos = newline + 1;
      continue;
    }
    if (char === "]") {
      const rest = source.slice(pos + 1).trim();
      if (rest.length > 0 && !rest.startsWith("#")) return null;
      return values;
    }
    if (char === ",") {
      if (expectValue) return null;
      expectValue = true;
      pos += 1;
      continue;
    }
    if (!expectValue) return null;

    const parsed = readString(source, pos);
    if (!parsed) return null;
    values.push(parsed.value);
    pos = parsed.end;
    expectValue = false;
  }

  return null;
}

function readString(source: string, start: number): { value: string; end: number } | null {
  const quote = source[start];

  if (quote === "'") {
    const close = source.indexOf("'", start + 1);
    if (close < 0) return null;
    const value = source.slice(start + 1, close);
    return value.includes("\n") ? null : { value, end: close + 1 };
  }

  if (quote !== '"') return null;

  let pos = start + 1;
  while (pos < source.length) {
    const char = source[pos];
    if (char === "\n") return null;
    if (char === "\\") {
      pos += 2;
      continue;
    }
    if (char === '"') {
      try {
        const value: unknown = JSON.parse(source.slice(start, pos + 1));
        return typeof value === "string" ? { value, end: pos + 1 } : null;
      } catch {
        return null;
      }
    }
    pos += 1;
  }

  return null;
}

// =============================================================================
// ENCODE
// =============================================================================

export function encodeHeader(header: DependencyHeader): string {
  const lines: string[] = [HEADER_OPEN];

  if (header.description !== null) {
    lines.push(`# description = ${quote(header.description)}`);
  }
  if (header.authors.length > 0) {
    lines.push(`# authors = ${inlineArray(header.authors)}`);
  }
  if (header.createdDate !== null) {
    lines.push(`# date = ${quote(header.createdDate)}`);
  }
  if (header.runtimeConstraint !== null) {
    lines.push(`# requires-python = ${quote(header.runtimeConstraint)}`);
  }

  if (header.dependencies.length === 0) {
    lines.push("# dependencies = []");
  } else {
    lines.push("# dependencies = [");
    for (const dependency of header.dependencies) {
      lines.push(`#   ${quote(dependency)},`);
    }
    lines.push("# ]");
  }

  if (header.tags.length > 0) {
    lines.push(`# tags = ${inlineArray(header.tags)}`);
  }

  for (const field of header.extraFields) {
    for (const line of field.lines) {
      lines.push(line.length > 0 ? `# ${line}` : "#");
    }
  }

  lines.push(HEADER_CLOSE);
  return lines.join("\n");
}

export function encodeScript(header: DependencyHeader, body: string): string {
  const trimmedBody = body.replace(/^\n+/, "");
  return `${encodeHeader(header)}\n\n${trimmedBody}`;
}

function quote(value: string): string {
  return JSON.stringify(value);
}

function inlineArray(values: string[]): string {
  return `[${values.map(quote).join(", ")}]`;
}

// =============================================================================
// DEFAULTS
// =============================================================================

export type HeaderDefaults = {
  description?: string;
  dependencies?: string[];
  runtimeConstraint?: string;
  authors?: string[];
  createdDate?: string;
  tags?: string[];
};

export function createHeader(defaults: HeaderDefaults = {}): DependencyHeader {
  return {
    ...emptyHeader(),
    description: defaults.description ?? null,
    dependencies: [...(defaults.dependencies ?? [])],
    runtimeConstraint: defaults.runtimeConstraint ?? null,
    authors: [...(defaults.authors ?? [])],
    createdDate: defaults.createdDate ?? null,
    tags: [...(defaults.tags ?? [])],
  };
}

export type EnsuredScript = {
  text: string;
  header: DependencyHeader;
  attached: boolean;
  problem?: string;
};

/**
 * Returns the text with a header on top. A valid existing header is kept as is;
 * a malformed one is reported through `problem` and left untouched.
 */
export function ensureHeader(text: string, defaults: HeaderDefaults = {}): EnsuredScript {
  const decoded = decodeScript(text);

  if (decoded.header) {
    return { text, header: decoded.header, attached: false };
  }
  if (decoded.problem) {
    return { text, header: emptyHeader(), attached: false, problem: decoded.problem };
  }

  const header = createHeader(defaults);
  return { text: encodeScript(header, text), header, attached: true };
}
