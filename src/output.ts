import chalk from 'chalk';

export interface OutputOptions {
  verbose: boolean;
  quiet: boolean;
}

/**
 * Status lines for the CLI. Everything goes to stderr so that converted
 * output written to stdout stays byte-clean.
 */
export class OutputReporter {
  constructor(private options: OutputOptions) {}

  get isVerbose(): boolean {
    return this.options.verbose;
  }

  success(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.green('✓'), message);
    }
  }

  error(message: string): void {
    console.error(chalk.red.bold('error:'), message);
  }

  warn(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.magenta.bold('warn:'), message);
    }
  }

  info(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.cyan.bold('info:'), chalk.dim(message));
    }
  }

  // Verbose only
  debug(message: string): void {
    if (this.options.verbose) {
      console.error(chalk.gray('⋯'), chalk.gray(message));
    }
  }

  // Field dump lines go to stdout; bold labels like the rest of the output
  dump(lines: readonly string[]): void {
    for (const line of lines) {
      console.log(line);
    }
  }

  label(text: string): string {
    return chalk.bold(text);
  }
}

export function createReporter(options: { verbose?: boolean; quiet?: boolean }): OutputReporter {
  return new OutputReporter({
    verbose: options.verbose ?? false,
    quiet: options.quiet ?? false,
  });
}
