export { Runner } from "./execution/runner";
export { Parser, parseTaskfile, loadTaskfile } from "./core/parser";
export { parseTemplate } from "./core/expression";
export { TaskRegistry, HELP_TASK } from "./core/registry";
export { VariableResolver } from "./core/resolver";
export { GraphBuilder } from "./core/graph-builder";
export { Executor } from "./execution/executor";
export { ExecaCommandRunner } from "./execution/shell";
export { formatTaskTable, printTaskTable } from "./utils/listing";
export { Logger, TaskLogger } from "./utils/logger";
export { loadConfig, DEFAULT_TASKFILE } from "./config";
export * from "./errors";

export type {
  Config,
  CommandOptions,
  CommandResult,
  CommandRunner,
  ExecutionPlan,
  ExpressionPart,
  RunOptions,
  Step,
  Task,
  TaskfileDefinition,
  TaskListing,
  Template,
  Variable,
} from "./types";
export type { MakeshiftConfig } from "./config";
export type { TaskDeclaration } from "./core/registry";
