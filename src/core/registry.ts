import debug from "debug";
import graphlib from "graphlib";
import { DanglingPrerequisiteError, UnknownTaskError } from "../errors";
import type { BuiltinAction, Step, Task, TaskfileDefinition, TaskListing } from "../types";
import { printTaskTable } from "../utils/listing";

const { Graph, alg } = graphlib;

const log = debug("makeshift:registry");

export const HELP_TASK = "help";

const printHelp: BuiltinAction = ({ listPublic }) => {
  printTaskTable(listPublic());
};

export type TaskDeclaration = {
  name: string;
  description?: string;
  prerequisites?: string[];
  steps?: Step[];
  line?: number;
  builtin?: BuiltinAction;
};

export type RegistryWarning = {
  message: string;
};

/**
 * Holds declared tasks in declaration order.
 *
 * Redeclaring a name replaces the earlier task outright (prerequisites, steps
 * and description) but keeps the slot it was first declared in, so listings
 * stay in first-declaration order. Builtins hold the first slots until a
 * declaration of the same name replaces them.
 */
export class TaskRegistry {
  private readonly tasks = new Map<string, Task>();
  private readonly descriptions = new Map<string, string>();

  constructor(options: { builtins?: boolean } = {}) {
    if (options.builtins ?? true) {
      this.declare({
        builtin: printHelp,
        description: "List available tasks",
        name: HELP_TASK,
      });
    }
  }

  static fromDefinition(definition: TaskfileDefinition): TaskRegistry {
    const registry = new TaskRegistry();
    for (const task of definition.tasks) {
      registry.declare(task);
    }
    for (const [name, description] of definition.descriptions) {
      registry.describe(name, description);
    }
    return registry;
  }

  declare(declaration: TaskDeclaration): Task {
    const task: Task = {
      name: declaration.name,
      prerequisites: [...(declaration.prerequisites ?? [])],
      steps: [...(declaration.steps ?? [])],
      ...(declaration.description !== undefined && {
        description: declaration.description,
      }),
      ...(declaration.line !== undefined && { line: declaration.line }),
      ...(declaration.builtin && { builtin: declaration.builtin }),
    };

    const existing = this.tasks.get(task.name);
    if (existing?.builtin && !task.builtin) {
      // A Taskfile's own declaration is listed where it was written
      log(`Task ${task.name} replaces the builtin`);
      this.tasks.delete(task.name);
    } else if (existing) {
      log(`Task ${task.name} redeclared, replacing the earlier declaration`);
    }
    this.tasks.set(task.name, task);
    return task;
  }

  /**
   * Attach a description from a `#name: text` marker. Markers take
   * precedence over a description given in the declaration itself.
   */
  describe(name: string, description: string): void {
    this.descriptions.set(name, description);
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  names(): string[] {
    return Array.from(this.tasks.keys());
  }

  lookup(name: string): Task {
    const task = this.tasks.get(name);
    if (!task) {
      throw new UnknownTaskError(name);
    }
    const description = this.descriptions.get(name) ?? task.description;
    return description === undefined ? task : { ...task, description };
  }

  listPublic(): TaskListing[] {
    const listings: TaskListing[] = [];
    for (const name of this.tasks.keys()) {
      const description = this.lookup(name).description?.trim();
      if (description) {
        listings.push({ description, name });
      }
    }
    return listings;
  }

  /**
   * Check declarations before anything runs.
   *
   * Throws on the first prerequisite that names no task. Cycles are only
   * reported here; planning fails once a requested task actually reaches one.
   */
  validate(): RegistryWarning[] {
    const warnings: RegistryWarning[] = [];
    const graph = new Graph();

    for (const task of this.tasks.values()) {
      graph.setNode(task.name);
    }

    for (const task of this.tasks.values()) {
      for (const prerequisite of task.prerequisites) {
        if (!this.tasks.has(prerequisite)) {
          throw new DanglingPrerequisiteError(task.name, prerequisite);
        }
        graph.setEdge(task.name, prerequisite);
      }
    }

    for (const name of this.descriptions.keys()) {
      if (!this.tasks.has(name)) {
        warnings.push({ message: `Description given for undeclared task "${name}"` });
      }
    }

    if (!alg.isAcyclic(graph)) {
      for (const cycle of alg.findCycles(graph)) {
        warnings.push({
          message: `Tasks form a dependency cycle: ${[...cycle].sort().join(", ")}`,
        });
      }
    }

    log("Validated %d tasks with %d warnings", this.tasks.size, warnings.length);
    return warnings;
  }
}
