import debug from "debug";
import { CyclicDependencyError, UnknownTaskError } from "../errors";
import type { ExecutionPlan } from "../types";
import type { TaskRegistry } from "./registry";

const log = debug("makeshift:graph");

export class GraphBuilder {
  /**
   * Build one execution plan for a batch of requested tasks.
   *
   * Depth-first from each root in the order given, prerequisites in declared
   * order. A task reached again through another path, or requested again
   * later in the batch, is scheduled only once.
   */
  buildPlan(roots: string[], registry: TaskRegistry): ExecutionPlan {
    const tasks: string[] = [];
    const visited = new Set<string>();
    const inProgress: string[] = [];

    log("=== Starting plan build ===");
    log("Requested tasks:", roots);

    const visit = (name: string, requiredBy?: string): void => {
      if (visited.has(name)) {
        log(`Already scheduled ${name}, skipping`);
        return;
      }

      const cycleStart = inProgress.indexOf(name);
      if (cycleStart !== -1) {
        throw new CyclicDependencyError([...inProgress.slice(cycleStart), name]);
      }

      if (!registry.has(name)) {
        throw new UnknownTaskError(name, requiredBy);
      }
      const task = registry.lookup(name);

      inProgress.push(name);
      for (const prerequisite of task.prerequisites) {
        visit(prerequisite, name);
      }
      inProgress.pop();

      visited.add(name);
      tasks.push(name);
      log(`Scheduled ${name} at position ${tasks.length}`);
    };

    for (const root of roots) {
      visit(root);
    }

    log("Execution order:", tasks);
    log("=== End plan build ===\n");

    return { targets: [...roots], tasks };
  }
}
