/** Exit code for every failure that has no subprocess exit code of its own */
export const RESERVED_EXIT_CODE = 2;

export type MakeshiftErrorCode =
  | "TASKFILE_NOT_FOUND"
  | "TASKFILE_PARSE"
  | "UNKNOWN_TASK"
  | "DANGLING_PREREQUISITE"
  | "UNDEFINED_VARIABLE"
  | "CYCLIC_VARIABLE_REFERENCE"
  | "VARIABLE_EXTRACTION"
  | "CYCLIC_DEPENDENCY"
  | "STEP_EXECUTION"
  | "INTERRUPTED";

export class MakeshiftError extends Error {
  readonly exitCode: number;

  constructor(
    message: string,
    public readonly code: MakeshiftErrorCode,
    exitCode: number = RESERVED_EXIT_CODE
  ) {
    super(message);
    this.name = "MakeshiftError";
    this.exitCode = exitCode;
  }
}

export class TaskfileNotFoundError extends MakeshiftError {
  constructor(public readonly path: string) {
    super(`No Taskfile found at ${path}`, "TASKFILE_NOT_FOUND");
    this.name = "TaskfileNotFoundError";
  }
}

export class TaskfileParseError extends MakeshiftError {
  constructor(
    message: string,
    public readonly line?: number,
    public readonly path?: string
  ) {
    const location = [path, line].filter((part) => part !== undefined).join(":");
    super(location ? `${location}: ${message}` : message, "TASKFILE_PARSE");
    this.name = "TaskfileParseError";
  }
}

export class UnknownTaskError extends MakeshiftError {
  constructor(
    public readonly taskName: string,
    public readonly requiredBy?: string
  ) {
    super(
      requiredBy
        ? `No task named "${taskName}" (required by "${requiredBy}")`
        : `No task named "${taskName}"`,
      "UNKNOWN_TASK"
    );
    this.name = "UnknownTaskError";
  }
}

export class DanglingPrerequisiteError extends MakeshiftError {
  constructor(
    public readonly taskName: string,
    public readonly prerequisite: string
  ) {
    super(
      `Task "${taskName}" depends on undeclared task "${prerequisite}"`,
      "DANGLING_PREREQUISITE"
    );
    this.name = "DanglingPrerequisiteError";
  }
}

export class UndefinedVariableError extends MakeshiftError {
  constructor(public readonly variable: string) {
    super(`Variable "${variable}" is not defined`, "UNDEFINED_VARIABLE");
    this.name = "UndefinedVariableError";
  }
}

export class CyclicVariableReferenceError extends MakeshiftError {
  constructor(public readonly chain: string[]) {
    super(
      `Variable references itself: ${chain.join(" -> ")}`,
      "CYCLIC_VARIABLE_REFERENCE"
    );
    this.name = "CyclicVariableReferenceError";
  }
}

export class VariableExtractionError extends MakeshiftError {
  constructor(
    public readonly variable: string | undefined,
    public readonly command: string,
    public readonly commandExitCode: number | undefined,
    public readonly stderr = ""
  ) {
    const subject = variable ? `variable "${variable}"` : "a step";
    const status =
      commandExitCode === undefined
        ? "was terminated"
        : `exited with code ${commandExitCode}`;
    const detail = stderr.trim() ? `: ${stderr.trim()}` : "";
    super(
      `Shell command for ${subject} ${status} (${command})${detail}`,
      "VARIABLE_EXTRACTION"
    );
    this.name = "VariableExtractionError";
  }
}

export class CyclicDependencyError extends MakeshiftError {
  constructor(public readonly cycle: string[]) {
    super(`Circular dependency detected: ${cycle.join(" -> ")}`, "CYCLIC_DEPENDENCY");
    this.name = "CyclicDependencyError";
  }
}

export class StepExecutionError extends MakeshiftError {
  constructor(
    public readonly taskName: string,
    public readonly stepIndex: number,
    public readonly command: string,
    public readonly commandExitCode: number | undefined,
    public readonly signal?: string
  ) {
    const status =
      commandExitCode === undefined
        ? `was terminated${signal ? ` by ${signal}` : ""}`
        : `failed with exit code ${commandExitCode}`;
    super(
      `Task "${taskName}" step ${stepIndex} ${status}: ${command}`,
      "STEP_EXECUTION",
      commandExitCode === undefined || commandExitCode === 0
        ? RESERVED_EXIT_CODE
        : commandExitCode
    );
    this.name = "StepExecutionError";
  }
}

const SIGNAL_NUMBERS: Record<string, number> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGTERM: 15,
};
const DEFAULT_SIGNAL_NUMBER = 15;

export class InterruptedError extends MakeshiftError {
  constructor(public readonly signal: string) {
    super(
      `Interrupted by ${signal}`,
      "INTERRUPTED",
      128 + (SIGNAL_NUMBERS[signal] ?? DEFAULT_SIGNAL_NUMBER)
    );
    this.name = "InterruptedError";
  }
}
