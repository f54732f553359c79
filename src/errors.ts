export const ExitCode = {
  Success: 0,
  Usage: 1,
  ComposeNotFound: 1,
  EnvNotFound: 2,
  EnvHasPorts: 3,
  LockTimeout: 4,
  RegistryWriteFailed: 5,
  EnvWriteFailed: 6,
  NoPortsAvailable: 7,
  AlreadyRegistered: 8,
  RegistryCorrupted: 9,
  DockerNotInstalled: 10,
  DockerNotRunning: 11,
  CommandFailed: 12,
  UserCancelled: 130,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Fatal error carrying the process exit status the CLI terminates with.
 * `hint` is printed after the message as remediation text.
 */
export class ShipyardError extends Error {
  public readonly exitCode: ExitCode;
  public readonly hint?: string;

  constructor(exitCode: ExitCode, message: string, hint?: string) {
    super(message);
    this.name = 'ShipyardError';
    this.exitCode = exitCode;
    this.hint = hint;
  }
}

export class LockTimeoutError extends ShipyardError {
  constructor(timeoutMs: number) {
    super(
      ExitCode.LockTimeout,
      `Failed to acquire lock after ${timeoutMs / 1000}s. Another process may be using the port registry.`
    );
    this.name = 'LockTimeoutError';
  }
}

export class CorruptRegistryError extends ShipyardError {
  public readonly file: string;
  public readonly line: number;

  constructor(file: string, line: number, reason: string, content: string) {
    super(
      ExitCode.RegistryCorrupted,
      `Registry file is corrupted or malformed.\n\nFile: ${file}\nInvalid line ${line}: "${content}" (${reason})`,
      'Please fix the registry file manually or delete it to start fresh.'
    );
    this.name = 'CorruptRegistryError';
    this.file = file;
    this.line = line;
  }
}

export class RegistryWriteError extends ShipyardError {
  constructor(file: string, cause: unknown) {
    super(ExitCode.RegistryWriteFailed, `Failed to write registry file: ${file} (${describeError(cause)})`);
    this.name = 'RegistryWriteError';
  }
}

function describeSearch(from: number, to: number, attempts: number): string {
  return attempts === 0 ? `Start port ${from} is above 65535` : `Searched range: ${from}-${to} (${attempts} attempts)`;
}

export class NoPortsAvailableError extends ShipyardError {
  public readonly from: number;
  public readonly to: number;

  constructor(variable: string, from: number, to: number, attempts: number) {
    super(
      ExitCode.NoPortsAvailable,
      `No available ports found for ${variable}\n${describeSearch(from, to, attempts)}`,
      "This is extremely rare. Please check your system's port usage."
    );
    this.name = 'NoPortsAvailableError';
    this.from = from;
    this.to = to;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
