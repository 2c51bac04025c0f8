import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import { GraphBuilder } from "../../core/graph-builder";
import { parseTaskfile } from "../../core/parser";
import { TaskRegistry } from "../../core/registry";
import { VariableResolver } from "../../core/resolver";
import {
  InterruptedError,
  StepExecutionError,
  UndefinedVariableError,
} from "../../errors";
import { Executor } from "../../execution/executor";
import type { RunOptions } from "../../types";
import { formatTaskTable } from "../../utils/listing";
import { FakeCommandRunner } from "../helpers/fake-command-runner";

function setup(source: string, options: RunOptions = { quiet: true }) {
  const definition = parseTaskfile(source);
  const registry = TaskRegistry.fromDefinition(definition);
  const runner = new FakeCommandRunner();
  const resolver = new VariableResolver(definition.variables, runner);
  const executor = new Executor({ registry, resolver, runner }, options);
  const plan = (...targets: string[]) =>
    new GraphBuilder().buildPlan(targets, registry);
  return { executor, plan, registry, runner };
}

describe("Executor", () => {
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("runs steps of every planned task in order", async () => {
    const { executor, plan, runner } = setup(
      [
        "A: B C",
        "\techo a",
        "B: D",
        "\techo b",
        "C: D",
        "\techo c1",
        "\techo c2",
        "D:",
        "\techo d",
      ].join("\n")
    );

    await executor.execute(plan("A"));

    expect(runner.commands).toEqual(["echo d", "echo b", "echo c1", "echo c2", "echo a"]);
  });

  it("stops at the first failing step", async () => {
    const { executor, plan, runner } = setup(
      ["all: x y", "x:", "\tstep one", "\tstep two", "\tstep three", "y:", "\tstep four"].join(
        "\n"
      )
    );
    runner.respond("step two", { exitCode: 3 });

    const error = await executor.execute(plan("all")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StepExecutionError);
    expect(error).toMatchObject({
      command: "step two",
      commandExitCode: 3,
      exitCode: 3,
      message: 'Task "x" step 2 failed with exit code 3: step two',
      stepIndex: 2,
      taskName: "x",
    });
    expect(runner.commands).toEqual(["step one", "step two"]);
  });

  it("reports a step killed by a signal with the reserved exit code", async () => {
    const { executor, plan, runner } = setup("t:\n\tsleep 100");
    runner.respond("sleep 100", { signal: "SIGKILL" });

    await expect(executor.execute(plan("t"))).rejects.toMatchObject({
      exitCode: 2,
      message: 'Task "t" step 1 was terminated by SIGKILL: sleep 100',
    });
  });

  it("substitutes extracted variables into commands", async () => {
    const { executor, plan, runner } = setup(
      [
        'VERSION = $(shell cut -d " " -f 2 VERSION)',
        "IMAGE = sample:${VERSION}",
        "image:",
        "\tdocker build -t ${IMAGE} .",
        "\tdocker push ${IMAGE}",
      ].join("\n")
    );
    runner.respond('cut -d " " -f 2 VERSION', { stdout: "1.2.3\n" });

    await executor.execute(plan("image"));

    expect(runner.commands).toEqual([
      'cut -d " " -f 2 VERSION',
      "docker build -t sample:1.2.3 .",
      "docker push sample:1.2.3",
    ]);
  });

  it("resolves every step of a task before running any of them", async () => {
    const { executor, plan, runner } = setup(
      ["first:", "\techo ok", "second: first", "\techo fine", "\techo ${MISSING}"].join("\n")
    );

    await expect(executor.execute(plan("second"))).rejects.toThrow(
      UndefinedVariableError
    );
    expect(runner.commands).toEqual(["echo ok"]);
  });

  it("treats tasks with no steps as no-ops", async () => {
    const { executor, plan, runner } = setup("alias: noop\nnoop:");

    await expect(executor.execute(plan("alias"))).resolves.toBeUndefined();

    expect(runner.commands).toEqual([]);
  });

  it("runs the builtin help task in process", async () => {
    const { executor, plan, registry, runner } = setup(
      "#build: Build everything\nbuild:\n\techo build"
    );

    await executor.execute(plan("help"));

    expect(runner.commands).toEqual([]);
    expect(consoleLogSpy).toHaveBeenCalledWith(formatTaskTable(registry.listPublic()));
  });

  describe("output", () => {
    it("echoes steps and prefixes their output", async () => {
      const { executor, plan, runner } = setup("greet:\n\techo hello", {});
      runner.respond("echo hello", { stdout: "hello\n" });

      await executor.execute(plan("greet"));

      const lines = consoleLogSpy.mock.calls.map((call) => String(call[0]));
      expect(lines.some((l) => l.includes("Running: greet"))).toBe(true);
      expect(lines.some((l) => l.includes("[greet]") && l.includes("$ echo hello"))).toBe(
        true
      );
      expect(
        lines.some((l) => l.includes("[greet]") && l.endsWith("hello") && !l.includes("$"))
      ).toBe(true);
      expect(lines.some((l) => l.includes("Completed: greet"))).toBe(true);
    });

    it("does not echo silent steps", async () => {
      const { executor, plan } = setup("quiet:\n\t@echo shh", {});

      await executor.execute(plan("quiet"));

      const lines = consoleLogSpy.mock.calls.map((call) => String(call[0]));
      expect(lines.some((l) => l.includes("$ echo shh"))).toBe(false);
    });

    it("sends step stderr to console.error", async () => {
      const { executor, plan, runner } = setup("warn:\n\tpip install .", {});
      runner.respond("pip install .", { stderr: "deprecated option\n" });

      await executor.execute(plan("warn"));

      const lines = consoleErrorSpy.mock.calls.map((call) => String(call[0]));
      expect(lines.some((l) => l.includes("[warn]") && l.includes("deprecated option"))).toBe(
        true
      );
    });

    it("prints output left without a trailing newline once the step ends", async () => {
      const { executor, plan, runner } = setup("greet:\n\tprintf hello", { prefix: false });
      runner.respond("printf hello", { stdout: "hello" });

      await executor.execute(plan("greet"));

      expect(consoleLogSpy).toHaveBeenCalledWith("hello");
    });

    it("prints nothing but errors in quiet mode", async () => {
      const { executor, plan, runner } = setup("greet:\n\techo hello");
      runner.respond("echo hello", { stdout: "hello\n" });

      await executor.execute(plan("greet"));

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe("interruption", () => {
    it("kills the running step and stops on SIGINT", async () => {
      const before = process.listenerCount("SIGINT");
      const { executor, plan, runner } = setup("long:\n\tsleep 100\n\techo after");
      runner.respond("sleep 100", {
        during: () => {
          const handler = process.listeners("SIGINT").at(-1);
          handler?.("SIGINT");
        },
        signal: "SIGTERM",
      });

      const error = await executor.execute(plan("long")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InterruptedError);
      expect(error).toMatchObject({ exitCode: 130, signal: "SIGINT" });
      expect(runner.killCount).toBe(1);
      expect(runner.commands).toEqual(["sleep 100"]);
      expect(process.listenerCount("SIGINT")).toBe(before);
    });

    it("reports an interrupt during a variable extraction as the interrupt", async () => {
      const { executor, plan, runner } = setup(
        ["VERSION = $(shell sleep 100)", "tag:", "\techo ${VERSION}"].join("\n")
      );
      runner.respond("sleep 100", {
        during: () => {
          const handler = process.listeners("SIGINT").at(-1);
          handler?.("SIGINT");
        },
        signal: "SIGTERM",
      });

      const error = await executor.execute(plan("tag")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InterruptedError);
      expect(error).toMatchObject({ exitCode: 130, signal: "SIGINT" });
      expect(runner.killCount).toBe(1);
      expect(runner.commands).toEqual(["sleep 100"]);
    });

    it("removes its signal handlers after a successful run", async () => {
      const before = process.listenerCount("SIGTERM");
      const { executor, plan } = setup("t:\n\ttrue");

      await executor.execute(plan("t"));

      expect(process.listenerCount("SIGTERM")).toBe(before);
    });
  });
});
