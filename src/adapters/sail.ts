import { join } from 'path';
import { runCommand, type CommandResult, type CommandRunner } from './command.js';

export class SailRunner {
  constructor(
    private projectPath: string,
    private run: CommandRunner = runCommand
  ) {}

  private sail(args: string[]): Promise<CommandResult> {
    return this.run(join(this.projectPath, 'vendor', 'bin', 'sail'), args, {
      cwd: this.projectPath,
      stdio: 'inherit',
    });
  }

  up(): Promise<CommandResult> {
    return this.sail(['up', '-d']);
  }

  composerSetup(): Promise<CommandResult> {
    return this.sail(['composer', 'setup']);
  }
}
