import {
  LLMClientError,
  composeUserPrompt,
  type BedrockConnectionOptions,
  type GenerationResult,
  type LLMClient,
} from '@claude3-cli/llm-core';

import type { ProfileProvider } from '../config/configService.js';
import { DEFAULT_MODEL, DEFAULT_REGION } from '../config/defaults.js';
import type { ResolvedProfile } from '../config/types.js';
import { CliUsageError } from '../errors.js';
import type { InputResolver, ResolvedInput } from '../inputResolver.js';
import type {
  CliCommandContext,
  CommandResult,
  ExecutionTelemetry,
  OutputFormat,
  ProcessIO,
} from '../types.js';

export interface CommonCommandOptions {
  files: string[];
  accessKey?: string;
  secretKey?: string;
  region?: string;
  model?: string;
  profile?: string;
  format: OutputFormat;
  help: boolean;
}

export type LlmFactory = (options: BedrockConnectionOptions) => LLMClient;

export interface GenerationCommandDependencies {
  inputResolver: Pick<InputResolver, 'resolve'>;
  configService: ProfileProvider;
  llmFactory: LlmFactory;
  env: NodeJS.ProcessEnv;
}

/** Returns true when the flag belonged to the command. */
export type ExtraOptionHandler<T> = (flag: string, readValue: () => string, parsed: T) => boolean;

export const CONNECTION_HELP = `  -k, --accessKey <id>    AWS access key id (default: $AWS_ACCESS_KEY_ID or the SDK credential chain)
  -s, --secretKey <key>   AWS secret access key (default: $AWS_SECRET_ACCESS_KEY)
  -r, --region <region>   Bedrock region (default: profile region or ${DEFAULT_REGION})
  -m, --model <id>        Model id (default: profile model or ${DEFAULT_MODEL})
      --profile <name>    Connection profile from config.json (default: defaultProfile)
      --format <text|json> Output format (default: text)
  -h, --help              Show this help`;

export function createCommonOptions(): CommonCommandOptions {
  return { files: [], format: 'text', help: false };
}

function splitInlineValue(token: string): [string, string | undefined] {
  const separator = token.indexOf('=');
  if (token.startsWith('--') && separator > 2) {
    return [token.slice(0, separator), token.slice(separator + 1)];
  }
  return [token, undefined];
}

function parseFormat(value: string): OutputFormat {
  const format = value.toLowerCase();
  if (format === 'text' || format === 'json') {
    return format;
  }
  throw new CliUsageError(`--format must be 'text' or 'json' (got '${value}')`);
}

export function parsePositiveInteger(flag: string, value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);

  if (!/^\+?\d+$/.test(trimmed) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new CliUsageError(`${flag} expects a positive integer (got '${value}')`);
  }

  return parsed;
}

/**
 * Positional arguments are file paths; `--` ends option parsing and a lone `-`
 * is treated as a path. Long options also accept `--flag=value`.
 */
export function parseCommandArgs<T extends CommonCommandOptions>(
  args: string[],
  parsed: T,
  extra?: ExtraOptionHandler<T>,
): T {
  let index = 0;
  let optionsEnded = false;

  while (index < args.length) {
    const token = args[index];
    index += 1;

    if (optionsEnded || token === '-' || !token.startsWith('-')) {
      parsed.files.push(token);
      continue;
    }

    if (token === '--') {
      optionsEnded = true;
      continue;
    }

    const [flag, inlineValue] = splitInlineValue(token);
    const readValue = (): string => {
      if (inlineValue !== undefined) {
        return inlineValue;
      }
      const value = args[index];
      if (value === undefined || (value.startsWith('-') && value !== '-')) {
        throw new CliUsageError(`${flag} option requires a value`);
      }
      index += 1;
      return value;
    };

    switch (flag) {
      case '-k':
      case '--accessKey':
        parsed.accessKey = readValue();
        break;
      case '-s':
      case '--secretKey':
        parsed.secretKey = readValue();
        break;
      case '-r':
      case '--region':
        parsed.region = readValue();
        break;
      case '-m':
      case '--model':
        parsed.model = readValue();
        break;
      case '--profile':
        parsed.profile = readValue();
        break;
      case '--format':
        parsed.format = parseFormat(readValue());
        break;
      case '-h':
      case '--help':
        parsed.help = true;
        break;
      default:
        if (!extra?.(flag, readValue, parsed)) {
          throw new CliUsageError(`Unknown option: ${flag}`);
        }
        break;
    }
  }

  return parsed;
}

export function normalize(value?: string | null): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export interface ResolvedConnection extends BedrockConnectionOptions {
  region: string;
  model: string;
  credentialSource: 'explicit' | 'default-chain';
}

/** Flags win over the profile, which wins over built-in defaults; keys fall back to the environment. */
export function resolveConnection(
  parsed: CommonCommandOptions,
  profile: ResolvedProfile,
  env: NodeJS.ProcessEnv,
): ResolvedConnection {
  const accessKeyId = normalize(parsed.accessKey) ?? normalize(env.AWS_ACCESS_KEY_ID);
  const secretAccessKey = normalize(parsed.secretKey) ?? normalize(env.AWS_SECRET_ACCESS_KEY);
  const region = normalize(parsed.region) ?? normalize(profile.region) ?? DEFAULT_REGION;
  const model = normalize(parsed.model) ?? normalize(profile.model) ?? DEFAULT_MODEL;

  return {
    accessKeyId,
    secretAccessKey,
    region,
    model,
    credentialSource: accessKeyId && secretAccessKey ? 'explicit' : 'default-chain',
  };
}

export async function resolveCommandInput(
  resolver: Pick<InputResolver, 'resolve'>,
  files: string[],
  io: ProcessIO,
): Promise<ResolvedInput> {
  if (files.length > 0) {
    return resolver.resolve({ kind: 'files', paths: files });
  }
  return resolver.resolve({ kind: 'stdin', stream: io.stdin() });
}

export interface GenerationPlan {
  format: OutputFormat;
  input: ResolvedInput;
  profile: ResolvedProfile;
  connection: ResolvedConnection;
  maxTokens: number;
  systemPrompt?: string;
  userPrompt?: string;
  execute(llm: LLMClient, model: string): Promise<GenerationResult>;
}

function clientErrorResult(
  plan: GenerationPlan,
  error: LLMClientError,
  telemetry: Partial<ExecutionTelemetry>,
): CommandResult {
  // The status of a failed call is always unset.
  const status = null;

  return {
    // A failed model call is reported but does not change the exit status.
    exitCode: 0,
    output:
      plan.format === 'json'
        ? {
            kind: 'json',
            data: {
              text: null,
              status,
              error: { code: 'E_CLIENT', name: error.errorName, message: error.message },
            },
          }
        : {
            kind: 'text',
            text: `A client error occurred: ${error.message}\n${JSON.stringify(status)}\n`,
          },
    logFile: plan.profile.logFile,
    logAppend: plan.profile.log.append,
    diagnostic: `A client error occurred: ${error.message}`,
    telemetry: { ...telemetry, errorCode: 'E_CLIENT' },
  };
}

export async function runGeneration(
  context: CliCommandContext,
  deps: GenerationCommandDependencies,
  plan: GenerationPlan,
): Promise<CommandResult> {
  const { input, profile, connection } = plan;
  const telemetryBase: Partial<ExecutionTelemetry> = {
    profile: profile.name,
    model: connection.model,
    inputBytes: input.metadata.bytes,
    skippedFiles: input.metadata.skippedPaths.length,
  };

  if (context.globals.dryRun) {
    return {
      exitCode: 0,
      output: {
        kind: 'dry-run',
        summary: 'Resolved the request without invoking the model',
        details: {
          profile: profile.name,
          model: connection.model,
          region: connection.region,
          credentials: connection.credentialSource,
          maxTokens: plan.maxTokens,
          inputSource: input.metadata.source,
          inputFiles: input.metadata.filePaths,
          skippedFiles: input.metadata.skippedPaths,
          inputBytes: input.metadata.bytes,
          systemPromptChars: plan.systemPrompt?.length ?? 0,
          userPromptChars: composeUserPrompt(plan.userPrompt, input.text).length,
        },
      },
      telemetry: telemetryBase,
    };
  }

  const client = deps.llmFactory({
    accessKeyId: connection.accessKeyId,
    secretAccessKey: connection.secretAccessKey,
    region: connection.region,
  });
  const startedAt = Date.now();

  let result: GenerationResult;
  try {
    result = await plan.execute(client, connection.model);
  } catch (error) {
    if (error instanceof LLMClientError) {
      return clientErrorResult(plan, error, telemetryBase);
    }
    throw error;
  }

  const durationMs = Date.now() - startedAt;
  const telemetry: Partial<ExecutionTelemetry> = {
    ...telemetryBase,
    outputTokens: result.status?.output_tokens,
    stopReason: result.status?.stop_reason,
  };

  const output =
    plan.format === 'json'
      ? {
          kind: 'json' as const,
          data: {
            text: result.text,
            status: result.status,
            model: connection.model,
            profile: profile.name,
            metrics: {
              durationMs,
              inputBytes: input.metadata.bytes,
              skippedFiles: input.metadata.skippedPaths.map((entry) => entry.path),
              outputTokens: result.status?.output_tokens ?? null,
            },
          },
        }
      : {
          kind: 'text' as const,
          text: `${result.text}\n`,
        };

  return {
    exitCode: 0,
    output,
    logFile: profile.logFile,
    logAppend: profile.log.append,
    telemetry,
  };
}
