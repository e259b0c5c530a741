import type {
  CliApplication,
  CliApplicationConfig,
  CliCommandContext,
  CliGlobals,
  CommandDescriptor,
  CommandResult,
  ExecutionTelemetry,
} from './types.js';

import { AuditLogger } from './auditLogger.js';
import { ErrorDomainMapper } from './errorDomainMapper.js';
import { OutputFormatter } from './outputFormatter.js';

interface ParsedArguments {
  command?: string;
  argv: string[];
  globals: CliGlobals;
  helpRequested: boolean;
  error?: string;
}

/**
 * Global options come first. With a default command configured, the first
 * token that is neither a global option nor a command name starts the default
 * command's own arguments.
 */
function parseArguments(
  rawArgs: string[],
  isCommand: (name: string) => boolean,
  defaultCommand?: string,
): ParsedArguments {
  const globals: CliGlobals = {
    quiet: false,
    dryRun: false,
    logFile: undefined,
  };

  let helpRequested = false;

  for (let i = 0; i < rawArgs.length; i += 1) {
    const token = rawArgs[i];

    if (token === '--help' || token === '-h') {
      helpRequested = true;
      continue;
    }

    if (token === '--quiet') {
      globals.quiet = true;
      continue;
    }

    if (token === '--dry-run') {
      globals.dryRun = true;
      continue;
    }

    if (token === '--log-file') {
      const value = rawArgs[i + 1];
      if (!value || value.startsWith('-')) {
        return {
          argv: [],
          globals,
          helpRequested,
          error: '--log-file option requires a file path',
        };
      }
      globals.logFile = value;
      i += 1;
      continue;
    }

    if (isCommand(token)) {
      return { command: token, argv: rawArgs.slice(i + 1), globals, helpRequested };
    }

    if (defaultCommand) {
      return { command: defaultCommand, argv: rawArgs.slice(i), globals, helpRequested };
    }

    if (token.startsWith('-')) {
      return {
        argv: [],
        globals,
        helpRequested,
        error: `Unknown option: ${token}`,
      };
    }

    return { command: token, argv: rawArgs.slice(i + 1), globals, helpRequested };
  }

  return {
    command: helpRequested ? undefined : defaultCommand,
    argv: [],
    globals,
    helpRequested,
  };
}

function formatUsage(
  config: CliApplicationConfig,
  commands: CommandDescriptor[],
): string {
  const lines: string[] = [];
  lines.push(`${config.description}`);
  lines.push('');
  lines.push(`Usage: ${config.name} [global-options] <command> [options]`);

  if (config.defaultCommand) {
    lines.push(`       ${config.name} [global-options] [${config.defaultCommand} options] [files...]`);
  }

  lines.push('');

  if (commands.length === 0) {
    lines.push('No commands have been registered yet.');
    return lines.join('\n');
  }

  lines.push('Commands:');

  for (const command of commands) {
    const marker = command.name === config.defaultCommand ? ' (default)' : '';
    lines.push(`  ${command.name} - ${command.summary}${marker}`);
  }

  lines.push('');
  lines.push('Global options:');
  lines.push('  --help       Show help for CLI or a command');
  lines.push('  --quiet      Suppress informational output');
  lines.push('  --dry-run    Show the request that would be sent without calling the model');
  lines.push('  --log-file   Append execution telemetry (JSON lines) to the provided file');

  return lines.join('\n');
}

export function createCliApplication(config: CliApplicationConfig): CliApplication {
  const { router } = config;
  const auditLogger = new AuditLogger();
  const errorMapper = new ErrorDomainMapper(config.name);

  return {
    async run(argv, io) {
      const [, , ...rawArgs] = argv;
      const parsed = parseArguments(
        rawArgs,
        (name) => router.find(name) !== undefined,
        config.defaultCommand,
      );
      const formatter = new OutputFormatter(io, parsed.globals);

      if (parsed.error) {
        io.writeStderr(`Error: ${parsed.error}\n`);
        io.writeStderr('Use --help to list available commands.\n');
        io.setExitCode(2);
        return 2;
      }

      if (!parsed.command) {
        if (parsed.helpRequested) {
          const usage = formatUsage(config, router.list());
          io.writeStdout(`${usage}\n`);
          io.setExitCode(0);
          return 0;
        }

        io.writeStderr("No command provided. Use '--help' to list available commands.\n");
        io.setExitCode(2);
        return 2;
      }

      const descriptor = router.find(parsed.command);

      if (!descriptor) {
        io.writeStderr(`Unknown command '${parsed.command}'.\n`);
        io.writeStderr('Use --help to list available commands.\n');
        io.setExitCode(2);
        return 2;
      }

      // `--help` given before the command name still asks for the command's help.
      const commandArgv = parsed.helpRequested ? ['--help', ...parsed.argv] : parsed.argv;
      const context: CliCommandContext = {
        globals: parsed.globals,
        argv: commandArgv,
        io,
      };

      const startedAt = new Date();
      let result: CommandResult;

      try {
        result = await descriptor.handler(context);
      } catch (error) {
        const mapped = errorMapper.map(error);
        result = {
          exitCode: mapped.exitCode,
          output: mapped.output,
          telemetry: { errorCode: mapped.errorCode },
        };
      }

      formatter.diagnose(result.diagnostic);
      formatter.emit(result.output);

      const finishedAt = new Date();
      const telemetry = buildTelemetry(
        descriptor.name,
        startedAt,
        finishedAt,
        result.exitCode,
        result.telemetry,
      );
      const logFile = parsed.globals.logFile ?? result.logFile;

      try {
        await auditLogger.record(telemetry, { filePath: logFile, append: result.logAppend });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        io.writeStderr(`Warning: could not write telemetry to ${logFile}: ${reason}\n`);
      }

      io.setExitCode(result.exitCode);
      return result.exitCode;
    },
  };
}

function buildTelemetry(
  commandName: string,
  startedAt: Date,
  finishedAt: Date,
  exitCode: number,
  partial?: Partial<ExecutionTelemetry>,
): ExecutionTelemetry {
  return {
    command: commandName,
    startedAt: startedAt.toISOString(),
    finishedAt: finishedAt.toISOString(),
    status: exitCode === 0 && !partial?.errorCode ? 'success' : 'failure',
    profile: partial?.profile,
    model: partial?.model,
    inputBytes: partial?.inputBytes,
    skippedFiles: partial?.skippedFiles,
    outputTokens: partial?.outputTokens,
    stopReason: partial?.stopReason,
    errorCode: partial?.errorCode,
  };
}
