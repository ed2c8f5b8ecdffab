/**
 * CLI Logger with colored output
 *
 * User-facing messages only; diagnostic logs go through lib/logger.
 */

export interface LoggerOptions {
  /** Enable verbose/debug output */
  verbose?: boolean;
  /** Emit ANSI colors (default: stdout is a TTY and NO_COLOR is unset) */
  color?: boolean;
}

/**
 * ANSI color codes for terminal output
 */
const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
};

type Color = Exclude<keyof typeof colors, 'reset'>;

function defaultColor(): boolean {
  return process.stdout.isTTY === true && process.env.NO_COLOR === undefined;
}

/**
 * CLI Logger with colored output
 */
export class CLILogger {
  private readonly verbose: boolean;
  private readonly color: boolean;

  constructor(options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.color = options.color ?? defaultColor();
  }

  private paint(color: Color, text: string): string {
    return this.color ? `${colors[color]}${text}${colors.reset}` : text;
  }

  info(message: string): void {
    console.log(`${this.paint('blue', '[INFO]')} ${message}`);
  }

  success(message: string): void {
    console.log(`${this.paint('green', '[✓]')} ${message}`);
  }

  warn(message: string): void {
    console.log(`${this.paint('yellow', '[WARN]')} ${message}`);
  }

  /**
   * Log error message to stderr
   */
  error(message: string): void {
    console.error(`${this.paint('red', '[ERROR]')} ${message}`);
  }

  /**
   * Log debug message (only when verbose is enabled)
   */
  debug(message: string): void {
    if (this.verbose) {
      console.log(`${this.paint('gray', '[DEBUG]')} ${message}`);
    }
  }

  blank(): void {
    console.log('');
  }

  /**
   * Print a title underlined with '='
   */
  header(title: string): void {
    console.log(this.paint('bold', title));
    console.log(this.paint('cyan', '='.repeat(title.length)));
  }

  /**
   * Print "Label:   value" rows with aligned values
   */
  fields(rows: ReadonlyArray<readonly [string, string]>): void {
    const width = Math.max(...rows.map(([label]) => label.length)) + 2;
    for (const [label, value] of rows) {
      console.log(`${`${label}:`.padEnd(width)}${value}`);
    }
  }
}
