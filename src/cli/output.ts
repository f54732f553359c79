import type { Logger } from '../types.js';

const codes = {
  blue: '\x1b[0;34m',
  cyan: '\x1b[0;36m',
  green: '\x1b[0;32m',
  red: '\x1b[0;31m',
  yellow: '\x1b[1;33m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
} as const;

export type Style = Exclude<keyof typeof codes, 'reset'>;

export interface OutputOptions {
  color: boolean;
  /** Send everything to stderr, leaving stdout to a wire protocol. */
  stderrOnly?: boolean;
}

export class Output implements Logger {
  private color: boolean;
  private stderrOnly: boolean;

  constructor(options: OutputOptions) {
    this.color = options.color;
    this.stderrOnly = options.stderrOnly ?? false;
  }

  private write(message: string): void {
    if (this.stderrOnly) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  paint(style: Style, text: string): string {
    return this.color ? `${codes[style]}${text}${codes.reset}` : text;
  }

  line(message = ''): void {
    this.write(message);
  }

  info(message: string): void {
    this.write(message);
  }

  success(message: string): void {
    this.write(`${this.paint('green', '✓')} ${message}`);
  }

  warn(message: string): void {
    console.error(`${this.paint('yellow', '!')} ${message}`);
  }

  error(message: string): void {
    console.error(`${this.paint('red', 'Error:')} ${message}`);
  }

  title(version: string): void {
    this.line(this.paint('cyan', 'Shipyard'));
    this.line(`⚓ ${this.paint('dim', `v${version} - Laravel Sail Project Setup`)}`);
    this.line();
  }
}
