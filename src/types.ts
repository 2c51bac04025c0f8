export type Config = {
  quiet?: boolean;
  prefix?: boolean | string;
};

export type ExpressionPart =
  | { kind: "literal"; text: string }
  | { kind: "reference"; name: string }
  | { kind: "shell"; command: Template };

export type Template = ExpressionPart[];

export type Variable = {
  name: string;
  value: Template;
  line?: number;
};

export type Step = {
  command: Template;
  /** Source text of the step, used in echo and error messages before interpolation */
  raw: string;
  silent: boolean;
};

export type BuiltinAction = (context: BuiltinContext) => void;

export type BuiltinContext = {
  listPublic: () => TaskListing[];
};

export type Task = {
  name: string;
  description?: string;
  prerequisites: string[];
  steps: Step[];
  line?: number;
  builtin?: BuiltinAction;
};

export type TaskListing = {
  name: string;
  description: string;
};

export type ExecutionPlan = {
  targets: string[];
  tasks: string[];
};

export type TaskfileDefinition = {
  path?: string;
  variables: Variable[];
  tasks: Task[];
  descriptions: Map<string, string>;
  defaultGoal?: string;
  phony: string[];
};

export type CommandResult = {
  exitCode?: number;
  signal?: string;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  env?: Record<string, string>;
  /** Capture stdout/stderr instead of streaming them */
  capture?: boolean;
  onStdout?: (chunk: string) => void;
  onStderr?: (chunk: string) => void;
};

export interface CommandRunner {
  run(command: string, options?: CommandOptions): Promise<CommandResult>;
  /** Stop whatever subprocess is currently running */
  kill(): void;
}

export interface RunOptions extends Config {
  cwd?: string;
  env?: Record<string, string>;
}
