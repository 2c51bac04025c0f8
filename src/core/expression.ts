import type { ExpressionPart, Template } from "../types";

const VARIABLE_NAME_PATTERN = /^[A-Za-z_.][A-Za-z0-9_.-]*$/;
const SHELL_FUNCTION_PATTERN = /^shell\s+/;

const CLOSING: Record<string, string> = { "(": ")", "{": "}" };

export class ExpressionSyntaxError extends Error {
  constructor(
    message: string,
    public readonly position: number
  ) {
    super(message);
    this.name = "ExpressionSyntaxError";
  }
}

/**
 * Parse a raw value into a template.
 *
 * - `$$` is a literal `$`
 * - `${NAME}` and `$(NAME)` reference a variable
 * - `$(shell command)` runs `command` (itself a template) and substitutes its stdout
 * - any other `$` is kept as-is so shell variables such as `$HOME` pass through
 */
export function parseTemplate(source: string): Template {
  const parts: ExpressionPart[] = [];
  let literal = "";
  let index = 0;

  const flushLiteral = () => {
    if (literal) {
      parts.push({ kind: "literal", text: literal });
      literal = "";
    }
  };

  while (index < source.length) {
    const char = source.charAt(index);
    const next = source.charAt(index + 1);

    if (char !== "$" || next === "") {
      literal += char;
      index++;
      continue;
    }

    if (next === "$") {
      literal += "$";
      index += 2;
      continue;
    }

    const close = CLOSING[next];
    if (!close) {
      literal += char;
      index++;
      continue;
    }

    const end = findClosing(source, index + 2, next, close);
    if (end === -1) {
      throw new ExpressionSyntaxError(
        `Unterminated "$${next}" starting at column ${index + 1}`,
        index
      );
    }

    flushLiteral();
    parts.push(parseReference(source.slice(index + 2, end), index));
    index = end + 1;
  }

  flushLiteral();
  return parts;
}

function parseReference(body: string, position: number): ExpressionPart {
  const trimmed = body.trim();

  if (SHELL_FUNCTION_PATTERN.test(trimmed)) {
    return {
      command: parseTemplate(trimmed.replace(SHELL_FUNCTION_PATTERN, "")),
      kind: "shell",
    };
  }

  if (!VARIABLE_NAME_PATTERN.test(trimmed)) {
    throw new ExpressionSyntaxError(
      `Unsupported expression "${body}" at column ${position + 1}`,
      position
    );
  }

  return { kind: "reference", name: trimmed };
}

function findClosing(
  source: string,
  from: number,
  open: string,
  close: string
): number {
  let depth = 1;
  for (let i = from; i < source.length; i++) {
    const char = source[i];
    if (char === open) {
      depth++;
    } else if (char === close) {
      depth--;
      if (depth === 0) {
        return i;
      }
    }
  }
  return -1;
}
