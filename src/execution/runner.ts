import debug from "debug";
import type { MakeshiftConfig } from "../config";
import { GraphBuilder } from "../core/graph-builder";
import { loadTaskfile } from "../core/parser";
import { HELP_TASK, TaskRegistry } from "../core/registry";
import { VariableResolver } from "../core/resolver";
import { MakeshiftError, RESERVED_EXIT_CODE } from "../errors";
import type { CommandRunner, RunOptions, TaskfileDefinition } from "../types";
import { Logger } from "../utils/logger";
import { Executor } from "./executor";
import { ExecaCommandRunner } from "./shell";

const log = debug("makeshift:runner");

export class Runner {
  private readonly graphBuilder = new GraphBuilder();
  private readonly commandRunner: CommandRunner;

  constructor(commandRunner: CommandRunner = new ExecaCommandRunner()) {
    this.commandRunner = commandRunner;
  }

  /**
   * Load the configured Taskfile and run the requested tasks.
   * Resolves to the process exit code; never rejects.
   */
  async run(args: string[], config: MakeshiftConfig): Promise<number> {
    let definition: TaskfileDefinition;
    try {
      definition = loadTaskfile(config.taskfile);
    } catch (error) {
      return this.report(error);
    }
    return this.runDefinition(args, definition, config);
  }

  async runDefinition(
    args: string[],
    definition: TaskfileDefinition,
    options: RunOptions = {}
  ): Promise<number> {
    const logger = new Logger(options);

    try {
      const registry = TaskRegistry.fromDefinition(definition);
      for (const warning of registry.validate()) {
        logger.warn(warning.message);
      }

      const targets =
        args.length > 0 ? args : [definition.defaultGoal || HELP_TASK];
      log("Targets:", targets);

      // Every plan is built before the first step runs
      const plan = this.graphBuilder.buildPlan(targets, registry);

      const resolver = new VariableResolver(definition.variables, this.commandRunner, {
        ...(options.cwd !== undefined && { cwd: options.cwd }),
        ...(options.env !== undefined && { env: options.env }),
      });
      const executor = new Executor(
        { registry, resolver, runner: this.commandRunner },
        options
      );
      await executor.execute(plan);
      return 0;
    } catch (error) {
      return this.report(error);
    }
  }

  private report(error: unknown): number {
    if (error instanceof MakeshiftError) {
      console.error(`makeshift: ${error.message}`);
      return error.exitCode;
    }
    const message = error instanceof Error ? error.message : String(error);
    console.error(`makeshift: ${message}`);
    return RESERVED_EXIT_CODE;
  }
}
