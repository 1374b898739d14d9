import type { CommandOutput, CommandPort } from '../../src/ports/CommandPort';

export const completed = (stdout: string, code = 0, stderr = ''): CommandOutput => ({
  kind: 'completed',
  code,
  stdout,
  stderr,
});

/**
 * Answers tool invocations from a table keyed by the full command line.
 * Unknown commands behave as if the binary were missing.
 */
export class FakeCommandPort implements CommandPort {
  public readonly calls: string[] = [];
  private readonly responses = new Map<string, CommandOutput>();
  private readonly installed = new Set<string>();

  public respond(commandLine: string, output: CommandOutput): this {
    this.responses.set(commandLine, output);
    return this;
  }

  public install(...binaries: string[]): this {
    for (const binary of binaries) {
      this.installed.add(binary);
    }
    return this;
  }

  public async run(binary: string, args: readonly string[]): Promise<CommandOutput> {
    const commandLine = [binary, ...args].join(' ');
    this.calls.push(commandLine);
    return this.responses.get(commandLine) ?? { kind: 'not_found', message: `${binary}: command not found` };
  }

  public async which(binary: string): Promise<boolean> {
    return this.installed.has(binary);
  }

  public callsTo(binary: string): string[] {
    return this.calls.filter((call) => call === binary || call.startsWith(`${binary} `));
  }
}
