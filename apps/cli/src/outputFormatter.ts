import type { CliGlobals, CommandOutput, OutputScope, ProcessIO } from './types.js';

function ensureTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

export class OutputFormatter {
  private readonly io: ProcessIO;

  private readonly globals: CliGlobals;

  constructor(io: ProcessIO, globals: CliGlobals) {
    this.io = io;
    this.globals = globals;
  }

  emit(output?: CommandOutput): void {
    if (!output || this.isSuppressed(output)) {
      return;
    }

    switch (output.kind) {
      case 'text':
        this.writeText(output.text, output.scope);
        break;
      case 'json':
        this.io.writeStdout(`${JSON.stringify(output.data, null, 2)}\n`);
        break;
      case 'dry-run':
        this.writeDryRun(output.summary, output.details);
        break;
      case 'error':
        this.writeError(output.code, output.message, output.suggestions);
        break;
      default: {
        const unsupported: never = output;
        throw new Error(`Unsupported output type: ${JSON.stringify(unsupported)}`);
      }
    }
  }

  diagnose(message?: string): void {
    if (message) {
      this.io.writeStderr(ensureTrailingNewline(message));
    }
  }

  private isSuppressed(output: CommandOutput): boolean {
    return this.globals.quiet && (output.kind === 'text' || output.kind === 'json') && output.scope === 'info';
  }

  private writeText(text: string, scope?: OutputScope): void {
    if (scope === 'error') {
      this.io.writeStderr(ensureTrailingNewline(text));
      return;
    }
    this.io.writeStdout(ensureTrailingNewline(text));
  }

  private writeDryRun(summary: string, details?: Record<string, unknown>): void {
    const lines = [`[dry-run] ${summary}`];
    if (details) {
      lines.push(JSON.stringify(details, null, 2));
    }
    this.io.writeStdout(`${lines.join('\n')}\n`);
  }

  private writeError(code: string, message: string, suggestions?: string[]): void {
    this.io.writeStderr(`Error [${code}]: ${message}\n`);
    for (const tip of suggestions ?? []) {
      this.io.writeStderr(`  - ${tip}\n`);
    }
  }
}
