import chalk from 'chalk';

class Logger {
  private debugEnabled = false;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  disableDebug(): void {
    this.debugEnabled = false;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      console.log(chalk.gray(`[golden-file] [DEBUG] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`[golden-file] [WARN] ${message}`), ...args);
  }

  // Messages may carry a coloured diff, so only the tag is styled
  error(message: string, ...args: unknown[]): void {
    console.error(`${chalk.red('[golden-file] [ERROR]')} ${message}`, ...args);
  }
}

export const logger = new Logger();
