import debug from "debug";
import {
  CyclicVariableReferenceError,
  UndefinedVariableError,
  VariableExtractionError,
} from "../errors";
import type { CommandOptions, CommandRunner, Template, Variable } from "../types";

const log = debug("makeshift:resolver");

const TRAILING_WHITESPACE = /\s+$/;

export type ResolverOptions = Pick<CommandOptions, "cwd" | "env">;

/**
 * Resolves variables lazily, once per run.
 *
 * Values are templates of literals, references to other variables and shell
 * extractions. Each variable is evaluated at most once; later lookups return
 * the memoized string.
 */
export class VariableResolver {
  private readonly declarations = new Map<string, Variable>();
  private readonly resolved = new Map<string, string>();
  private readonly runner: CommandRunner;
  private readonly options: ResolverOptions;

  constructor(
    variables: Variable[],
    runner: CommandRunner,
    options: ResolverOptions = {}
  ) {
    // Later assignments replace earlier ones
    for (const variable of variables) {
      this.declarations.set(variable.name, variable);
    }
    this.runner = runner;
    this.options = options;
  }

  resolve(name: string): Promise<string> {
    return this.resolveInChain(name, []);
  }

  /**
   * Evaluate a template that is not itself a variable, such as a step command
   */
  interpolate(template: Template): Promise<string> {
    return this.evaluate(template, []);
  }

  private async resolveInChain(name: string, chain: string[]): Promise<string> {
    const cached = this.resolved.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const start = chain.indexOf(name);
    if (start !== -1) {
      throw new CyclicVariableReferenceError([...chain.slice(start), name]);
    }

    const variable = this.declarations.get(name);
    if (!variable) {
      throw new UndefinedVariableError(name);
    }

    const value = await this.evaluate(variable.value, [...chain, name]);
    this.resolved.set(name, value);
    log(`Resolved ${name} = ${JSON.stringify(value)}`);
    return value;
  }

  private async evaluate(template: Template, chain: string[]): Promise<string> {
    let value = "";
    for (const part of template) {
      switch (part.kind) {
        case "literal":
          value += part.text;
          break;
        case "reference":
          value += await this.resolveInChain(part.name, chain);
          break;
        case "shell":
          value += await this.extract(
            await this.evaluate(part.command, chain),
            chain.at(-1)
          );
          break;
      }
    }
    return value;
  }

  private async extract(command: string, variable?: string): Promise<string> {
    log(`Extracting ${variable ?? "inline value"} with: ${command}`);
    const result = await this.runner.run(command, {
      ...this.options,
      capture: true,
    });

    if (result.exitCode !== 0) {
      throw new VariableExtractionError(
        variable,
        command,
        result.exitCode,
        result.stderr
      );
    }

    return result.stdout.replace(TRAILING_WHITESPACE, "");
  }
}
