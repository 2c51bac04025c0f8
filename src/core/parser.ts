import { existsSync, readFileSync } from "node:fs";
import debug from "debug";
import { TaskfileNotFoundError, TaskfileParseError } from "../errors";
import type { Step, Task, TaskfileDefinition, Variable } from "../types";
import { ExpressionSyntaxError, parseTemplate } from "./expression";

const log = debug("makeshift:parser");

// Regex patterns used in parsing
const VARIABLE_PATTERN = /^([A-Za-z_.][A-Za-z0-9_.-]*)\s*:?=\s*(.*)$/;
const TASK_HEADER_PATTERN = /^([A-Za-z0-9_.\-/]+)\s*:(?!=)\s*(.*)$/;
const DESCRIPTION_PATTERN = /^#([A-Za-z0-9_.\-/]+):\s*(.*)$/;
const STEP_PATTERN = /^[ \t]+(\S.*)$/;
const CONTINUATION_PATTERN = /\\$/;
const WHITESPACE_PATTERN = /\s+/;

const DEFAULT_GOAL_VARIABLE = ".DEFAULT_GOAL";
const PHONY_TARGET = ".PHONY";

type LogicalLine = {
  text: string;
  line: number;
};

export class Parser {
  private readonly path: string | undefined;

  constructor(path?: string) {
    this.path = path;
  }

  parse(source: string): TaskfileDefinition {
    const result: TaskfileDefinition = {
      descriptions: new Map(),
      phony: [],
      tasks: [],
      variables: [],
      ...(this.path !== undefined && { path: this.path }),
    };

    let current: Task | undefined;

    for (const { text, line } of this.joinContinuations(source)) {
      const stepMatch = text.match(STEP_PATTERN);
      if (stepMatch?.[1] !== undefined) {
        if (!current) {
          throw this.error("Step found before any task header", line);
        }
        current.steps.push(this.parseStep(stepMatch[1], line));
        continue;
      }

      const trimmed = text.trim();
      if (!trimmed) {
        continue;
      }

      // Comments may sit between steps; anything else at column zero ends the task
      if (trimmed.startsWith("#")) {
        this.processComment(trimmed, result);
        continue;
      }
      current = undefined;

      const variableMatch = trimmed.match(VARIABLE_PATTERN);
      if (variableMatch?.[1] !== undefined) {
        this.processVariable(variableMatch[1], variableMatch[2] ?? "", line, result);
        continue;
      }

      const headerMatch = trimmed.match(TASK_HEADER_PATTERN);
      if (headerMatch?.[1] !== undefined) {
        current = this.processHeader(headerMatch[1], headerMatch[2] ?? "", line, result);
        continue;
      }

      throw this.error(`Unrecognised line "${trimmed}"`, line);
    }

    log(
      "Parsed %d variables and %d task declarations",
      result.variables.length,
      result.tasks.length
    );
    return result;
  }

  private joinContinuations(source: string): LogicalLine[] {
    const lines: LogicalLine[] = [];
    const raw = source.split(/\r?\n/);
    let index = 0;

    while (index < raw.length) {
      const logical: LogicalLine = { line: index + 1, text: raw[index] ?? "" };
      index++;

      while (CONTINUATION_PATTERN.test(logical.text) && index < raw.length) {
        const next = raw[index] ?? "";
        logical.text = `${logical.text.replace(CONTINUATION_PATTERN, "").trimEnd()} ${next.trim()}`;
        index++;
      }
      lines.push(logical);
    }

    return lines;
  }

  private processComment(text: string, result: TaskfileDefinition): void {
    const match = text.match(DESCRIPTION_PATTERN);
    if (!(match?.[1] && match[2])) {
      return;
    }
    // Last marker for a name wins
    result.descriptions.set(match[1], match[2].trim());
  }

  private processVariable(
    name: string,
    value: string,
    line: number,
    result: TaskfileDefinition
  ): void {
    if (name === DEFAULT_GOAL_VARIABLE) {
      result.defaultGoal = value.trim();
      log(`Default goal set to ${result.defaultGoal}`);
      return;
    }

    const variable: Variable = {
      line,
      name,
      value: this.template(value.trim(), line),
    };
    result.variables.push(variable);
  }

  private processHeader(
    name: string,
    rest: string,
    line: number,
    result: TaskfileDefinition
  ): Task | undefined {
    const names = rest.split(WHITESPACE_PATTERN).filter((n) => n);

    if (name === PHONY_TARGET) {
      result.phony.push(...names);
      return undefined;
    }

    const task: Task = {
      line,
      name,
      prerequisites: names,
      steps: [],
    };
    result.tasks.push(task);
    return task;
  }

  private parseStep(text: string, line: number): Step {
    const silent = text.startsWith("@");
    const raw = silent ? text.slice(1).trimStart() : text;
    return {
      command: this.template(raw, line),
      raw,
      silent,
    };
  }

  private template(source: string, line: number) {
    try {
      return parseTemplate(source);
    } catch (error) {
      if (error instanceof ExpressionSyntaxError) {
        throw this.error(error.message, line);
      }
      throw error;
    }
  }

  private error(message: string, line: number): TaskfileParseError {
    return new TaskfileParseError(message, line, this.path);
  }
}

export function parseTaskfile(source: string, path?: string): TaskfileDefinition {
  const parser = new Parser(path);
  return parser.parse(source);
}

export function loadTaskfile(path: string): TaskfileDefinition {
  if (!existsSync(path)) {
    throw new TaskfileNotFoundError(path);
  }
  log(`Loading ${path}`);
  return parseTaskfile(readFileSync(path, "utf-8"), path);
}
