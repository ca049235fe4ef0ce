import chalk from 'chalk'

/**
 * Colored console logger.
 * `quiet` silences everything; `debug` lines appear only when `verbose`.
 */
export class Logger {
  constructor(
    private verbose: boolean = false,
    private quiet: boolean = false,
  ) {}

  error(message: string, details?: unknown): void {
    if (this.quiet) return
    console.error(chalk.red('error:'), message)
    if (this.verbose && details !== undefined) {
      console.error(chalk.gray(this.formatDetails(details)))
    }
  }

  warn(message: string, details?: unknown): void {
    if (this.quiet) return
    console.warn(chalk.yellow('warning:'), message)
    if (this.verbose && details !== undefined) {
      console.warn(chalk.gray(this.formatDetails(details)))
    }
  }

  info(message: string, details?: unknown): void {
    if (this.quiet) return
    console.log(chalk.blue('info:'), message)
    if (this.verbose && details !== undefined) {
      console.log(chalk.gray(this.formatDetails(details)))
    }
  }

  success(message: string, details?: unknown): void {
    if (this.quiet) return
    console.log(chalk.green('done:'), message)
    if (this.verbose && details !== undefined) {
      console.log(chalk.gray(this.formatDetails(details)))
    }
  }

  debug(message: string, details?: unknown): void {
    if (!this.verbose || this.quiet) return
    console.log(chalk.gray('debug:'), message)
    if (details !== undefined) {
      console.log(chalk.gray(this.formatDetails(details)))
    }
  }

  private formatDetails(details: unknown): string {
    if (typeof details === 'string') {
      return details
    }
    return JSON.stringify(details, null, 2)
  }
}

// Shared silent instance for library calls made without a logger
export const silentLogger = new Logger(false, true)
