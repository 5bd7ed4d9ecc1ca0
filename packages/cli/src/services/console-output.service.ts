import chalk from "chalk";
import ora, { type Ora } from "ora";
import type { IOutputService } from "../interfaces/output.interface";

export interface ConsoleOutputOptions {
  /** Suppress spinners and decorative lines, e.g. for --json */
  quiet?: boolean;
}

export class ConsoleOutputService implements IOutputService {
  private spinner: Ora | null = null;

  constructor(private readonly options: ConsoleOutputOptions = {}) {}

  success(message: string): void {
    this.print(chalk.green(message));
  }

  warn(message: string): void {
    this.print(chalk.yellow(message));
  }

  error(message: string): void {
    this.withSpinnerCleared(() => console.error(chalk.red(message)));
  }

  dim(message: string): void {
    this.print(chalk.gray(message));
  }

  json(value: unknown): void {
    console.log(JSON.stringify(value, null, 2));
  }

  startSpinner(text: string): void {
    if (this.options.quiet) {
      return;
    }
    this.spinner?.stop();
    this.spinner = ora(text).start();
  }

  succeedSpinner(text?: string): void {
    this.spinner?.succeed(text);
    this.spinner = null;
  }

  failSpinner(text?: string): void {
    this.spinner?.fail(text);
    this.spinner = null;
  }

  private print(line: string): void {
    if (this.options.quiet) {
      return;
    }
    this.withSpinnerCleared(() => console.log(line));
  }

  // Lines written while a spinner is active would be overwritten on its next frame.
  private withSpinnerCleared(write: () => void): void {
    if (!this.spinner) {
      write();
      return;
    }
    this.spinner.clear();
    write();
    this.spinner.render();
  }
}
