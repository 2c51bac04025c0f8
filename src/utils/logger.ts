import ansis from "ansis";
import type { Config } from "../types";

export type OutputStream = "stdout" | "stderr";

const palette = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.gray,
] as const;

type Paint = (typeof palette)[number];

const LINE_BREAK = /\r?\n/;

/**
 * Console output of a run: status messages, step echoes and prefixed task
 * output. Only stderr and warnings are printed in quiet mode.
 */
export class Logger {
  private readonly paints = new Map<string, Paint>();
  private readonly quiet: boolean;
  private readonly prefix: boolean | string;
  private width = 0;

  constructor(config: Config = {}) {
    this.quiet = config.quiet ?? false;
    this.prefix = config.prefix ?? true;
  }

  /**
   * Register every task of a plan up front so prefixes line up from the first line
   */
  registerTask(taskName: string): void {
    if (this.paints.has(taskName)) {
      return;
    }
    this.paints.set(taskName, palette[this.paints.size % palette.length] ?? ansis.white);
    this.width = Math.max(this.width, taskName.length);
  }

  forTask(taskName: string): TaskLogger {
    this.registerTask(taskName);
    return new TaskLogger(this, taskName);
  }

  /** Print one complete line of a task's output; blank lines are dropped */
  line(taskName: string, stream: OutputStream, text: string): void {
    if (!text.trim()) {
      return;
    }
    if (stream === "stderr") {
      console.error(this.decorate(taskName, ansis.red(text)));
    } else if (!this.quiet) {
      console.log(this.decorate(taskName, text));
    }
  }

  command(taskName: string, command: string): void {
    if (this.quiet) {
      return;
    }
    console.log(this.decorate(taskName, ansis.dim(`$ ${command}`)));
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(`${ansis.blue("ℹ")} ${message}`);
    }
  }

  success(message: string): void {
    if (!this.quiet) {
      console.log(`${ansis.green("✓")} ${message}`);
    }
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  private decorate(taskName: string, text: string): string {
    if (this.prefix === false) {
      return text;
    }
    const paint = this.paints.get(taskName) ?? ansis.white;
    if (typeof this.prefix === "string") {
      return `${paint(this.prefix)} ${text}`;
    }
    // +2 for the brackets
    const label = `[${taskName}]`.padEnd(this.width + 2);
    return `${paint(label)} ${ansis.gray("|")} ${text}`;
  }
}

/**
 * Output of one task. Subprocess chunks rarely end on a line boundary, so the
 * unfinished tail of each stream is held until the next chunk or `flush`.
 */
export class TaskLogger {
  readonly taskName: string;
  private readonly parent: Logger;
  private readonly pending: Record<OutputStream, string> = { stderr: "", stdout: "" };

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  stdout(chunk: string): void {
    this.write("stdout", chunk);
  }

  stderr(chunk: string): void {
    this.write("stderr", chunk);
  }

  command(command: string): void {
    this.parent.command(this.taskName, command);
  }

  /** Print whatever is still held, once the step has exited */
  flush(): void {
    for (const stream of ["stdout", "stderr"] as const) {
      const rest = this.pending[stream];
      this.pending[stream] = "";
      this.parent.line(this.taskName, stream, rest);
    }
  }

  private write(stream: OutputStream, chunk: string): void {
    const lines = `${this.pending[stream]}${chunk}`.split(LINE_BREAK);
    this.pending[stream] = lines.pop() ?? "";
    for (const line of lines) {
      this.parent.line(this.taskName, stream, line);
    }
  }
}
