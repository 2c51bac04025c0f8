import debug from "debug";
import type { TaskRegistry } from "../core/registry";
import type { VariableResolver } from "../core/resolver";
import { InterruptedError, StepExecutionError } from "../errors";
import type { CommandResult, CommandRunner, ExecutionPlan, RunOptions, Task } from "../types";
import { Logger, type TaskLogger } from "../utils/logger";

const log = debug("makeshift:executor");

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export type ExecutorDependencies = {
  registry: TaskRegistry;
  resolver: VariableResolver;
  runner: CommandRunner;
};

/**
 * Runs a plan strictly in order, one step at a time. The first failing step
 * stops the whole run; nothing already done is undone.
 */
export class Executor {
  private readonly logger: Logger;
  private readonly options: RunOptions;
  private readonly registry: TaskRegistry;
  private readonly resolver: VariableResolver;
  private readonly runner: CommandRunner;
  private aborted: string | undefined;

  constructor(dependencies: ExecutorDependencies, options: RunOptions = {}) {
    this.registry = dependencies.registry;
    this.resolver = dependencies.resolver;
    this.runner = dependencies.runner;
    this.options = options;
    this.logger = new Logger(options);
  }

  async execute(plan: ExecutionPlan): Promise<void> {
    log("=== Starting execution ===");
    log("Plan:", plan.tasks);

    for (const name of plan.tasks) {
      this.logger.registerTask(name);
    }

    const handlers = SHUTDOWN_SIGNALS.map((signal) => {
      const handler = () => this.shutdown(signal);
      process.on(signal, handler);
      return { handler, signal };
    });

    try {
      for (const name of plan.tasks) {
        this.checkAborted();
        await this.runTask(this.registry.lookup(name));
      }
    } finally {
      for (const { handler, signal } of handlers) {
        process.removeListener(signal, handler);
      }
    }

    log("=== Execution finished ===");
  }

  private async runTask(task: Task): Promise<void> {
    log(`\n=== Running task: ${task.name} ===`);

    if (task.builtin) {
      task.builtin({ listPublic: () => this.registry.listPublic() });
      return;
    }

    if (task.steps.length === 0) {
      log(`Task ${task.name} has no steps`);
      return;
    }

    // Resolve every step before the first one runs
    const commands: string[] = [];
    try {
      for (const step of task.steps) {
        commands.push(await this.resolver.interpolate(step.command));
      }
    } catch (error) {
      // A killed extraction surfaces as the interrupt, not as its own failure
      this.checkAborted();
      throw error;
    }

    this.logger.info(`Running: ${task.name}`);
    const logger = this.logger.forTask(task.name);

    for (const [index, step] of task.steps.entries()) {
      const command = commands[index] ?? step.raw;
      this.checkAborted();
      if (!step.silent) {
        logger.command(command);
      }
      await this.runStep(logger, index + 1, command);
    }

    this.logger.success(`Completed: ${task.name}`);
  }

  private async runStep(
    logger: TaskLogger,
    stepIndex: number,
    command: string
  ): Promise<void> {
    log(`Step ${stepIndex} of ${logger.taskName}: ${command}`);

    let result: CommandResult;
    try {
      result = await this.runner.run(command, {
        ...(this.options.cwd !== undefined && { cwd: this.options.cwd }),
        ...(this.options.env !== undefined && { env: this.options.env }),
        onStderr: (chunk) => logger.stderr(chunk),
        onStdout: (chunk) => logger.stdout(chunk),
      });
    } finally {
      logger.flush();
    }

    this.checkAborted();

    if (result.exitCode !== 0) {
      throw new StepExecutionError(
        logger.taskName,
        stepIndex,
        command,
        result.exitCode,
        result.signal
      );
    }
  }

  private checkAborted(): void {
    if (this.aborted) {
      throw new InterruptedError(this.aborted);
    }
  }

  private shutdown(signal: string): void {
    if (this.aborted) {
      return;
    }
    this.aborted = signal;
    this.logger.info("Shutting down...");
    this.runner.kill();
  }
}
