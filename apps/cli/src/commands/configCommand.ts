import type { ConfigService } from '../config/configService.js';
import type { ProfileSummary, UpsertProfileInput } from '../config/types.js';
import { CliUsageError } from '../errors.js';
import type { CommandDescriptor, CommandResult } from '../types.js';
import { parsePositiveInteger } from './generationSupport.js';

export interface ConfigCommandDependencies {
  configService: Pick<
    ConfigService,
    'listProfiles' | 'setDefaultProfile' | 'ensureConfigFile' | 'upsertProfile'
  >;
}

function buildListOutput(profiles: ProfileSummary[]): string {
  if (profiles.length === 0) {
    return 'No profiles configured yet. Use `claude3-cli config set <name>` to add one.';
  }

  const nameWidth = Math.max(...profiles.map((profile) => profile.name.length)) + 2;
  const lines: string[] = [];
  lines.push('Configured profiles:');

  for (const profile of profiles) {
    const indicator = profile.isDefault ? '*' : ' ';
    const region = profile.region ?? '(region not set)';
    const nameColumn = profile.name.padEnd(nameWidth, ' ');
    const maxTokens = profile.maxTokens === undefined ? '' : `  maxTokens=${profile.maxTokens}`;
    lines.push(
      `${indicator} ${nameColumn} ${region}  model=${profile.model}${maxTokens}  updated=${profile.updatedAt}`,
    );
  }

  lines.push('');
  lines.push("'*' indicates the default profile.");
  return lines.join('\n');
}

async function handleList(
  deps: ConfigCommandDependencies,
): Promise<CommandResult> {
  const profiles = await deps.configService.listProfiles();
  return {
    exitCode: 0,
    output: { kind: 'text', text: `${buildListOutput(profiles)}\n` },
  };
}

async function handleUse(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const target = argv[1];

  if (!target) {
    throw new CliUsageError('Profile name is required for `claude3-cli config use <name>`');
  }

  await deps.configService.setDefaultProfile(target);

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Default profile set to '${target}'.\n`, scope: 'info' },
  };
}

async function handleInit(
  deps: ConfigCommandDependencies,
): Promise<CommandResult> {
  const { created, path } = await deps.configService.ensureConfigFile();
  const text = created
    ? `Config file initialized at ${path}.\n`
    : `Config file already exists at ${path}.\n`;
  return {
    exitCode: 0,
    output: { kind: 'text', text, scope: 'info' },
  };
}

function parseSetArgs(args: string[]): UpsertProfileInput {
  const input: UpsertProfileInput = {};

  for (let i = 0; i < args.length; i += 1) {
    const flag = args[i];
    const value = args[i + 1];

    if (value === undefined) {
      throw new CliUsageError(`${flag} option requires a value`);
    }

    switch (flag) {
      case '--region':
        input.region = value;
        break;
      case '--model':
        input.model = value;
        break;
      case '--max-tokens':
        input.maxTokens = parsePositiveInteger(flag, value);
        break;
      case '--log-file':
        input.logFile = value;
        break;
      default:
        throw new CliUsageError(`Unknown option for config set: ${flag}`);
    }

    i += 1;
  }

  return input;
}

async function handleSet(
  deps: ConfigCommandDependencies,
  argv: string[],
): Promise<CommandResult> {
  const [, name, ...rest] = argv;

  if (!name || name.startsWith('-')) {
    throw new CliUsageError('Profile name is required for `claude3-cli config set <name>`');
  }

  const input = parseSetArgs(rest);
  await deps.configService.upsertProfile(name, input);

  return {
    exitCode: 0,
    output: { kind: 'text', text: `Profile '${name}' saved.\n`, scope: 'info' },
  };
}

function buildUsage(): string {
  return `Config command

Usage:
  claude3-cli config list                 # Show configured profiles
  claude3-cli config use <name>           # Switch default profile
  claude3-cli config init                 # Create config.json if missing
  claude3-cli config set <name> [options] # Create or update a profile

Options for set:
  --region <region>     Bedrock region
  --model <id>          Default model id
  --max-tokens <n>      Default maximum output tokens for the prompt command
  --log-file <path>     Append run telemetry for this profile to the file`;
}

export function createConfigCommandDescriptor(
  deps: ConfigCommandDependencies,
): CommandDescriptor {
  return {
    name: 'config',
    summary: 'Manage connection profiles',
    usage: 'config <sub-command>',
    handler: async (context) => {
      const [subcommand] = context.argv;

      if (!subcommand || subcommand === '--help' || subcommand === '-h') {
        return {
          exitCode: 0,
          output: { kind: 'text', text: `${buildUsage()}\n`, scope: 'info' },
        };
      }

      switch (subcommand) {
        case 'list':
          return handleList(deps);
        case 'use':
          return handleUse(deps, context.argv);
        case 'init':
          return handleInit(deps);
        case 'set':
          return handleSet(deps, context.argv);
        default:
          throw new CliUsageError(
            `Unknown config sub-command '${subcommand}'. Available: list, use, init, set`,
          );
      }
    },
  };
}
