import type { completePrompt } from '@claude3-cli/llm-core';

import { DEFAULT_MAX_TOKENS } from '../config/defaults.js';
import { applyPromptOverrides, type PromptFileLoader } from '../promptFileLoader.js';
import type {
  CliCommandContext,
  CommandDescriptor,
  CommandHandler,
  CommandResult,
} from '../types.js';
import {
  CONNECTION_HELP,
  createCommonOptions,
  parseCommandArgs,
  parsePositiveInteger,
  resolveCommandInput,
  resolveConnection,
  runGeneration,
  type CommonCommandOptions,
  type GenerationCommandDependencies,
} from './generationSupport.js';

export interface PromptCommandOptions extends CommonCommandOptions {
  maxTokens?: number;
  systemPrompt?: string;
  userPrompt?: string;
  promptFile?: string;
}

export interface PromptCommandDependencies extends GenerationCommandDependencies {
  promptFileLoader: Pick<PromptFileLoader, 'load'>;
  completionExecutor: typeof completePrompt;
}

function buildHelpMessage(): string {
  return `Send file contents or stdin to a Claude 3 model on Amazon Bedrock and print the answer

Usage:
  claude3-cli [global-options] [prompt] [options] [files...]
  cat notes.md | claude3-cli -u "Summarize:"

Files are concatenated in order; paths that do not exist are skipped.
Without files the whole of stdin is sent.

Options:
${CONNECTION_HELP}
  -x, --maxTokens <n>     Maximum output tokens; 0 keeps the default (profile value or ${DEFAULT_MAX_TOKENS})
  -a, --systemprompt <t>  System prompt (overrides the prompt file)
  -u, --prompt <text>     User prompt placed before the content (overrides the prompt file)
  -p, --promptfile <path> JSON file with optional "system_prompt" and "user_prompt"`;
}

export function parsePromptCommandArgs(args: string[]): PromptCommandOptions {
  const initial: PromptCommandOptions = createCommonOptions();

  return parseCommandArgs(args, initial, (flag, readValue, parsed) => {
    switch (flag) {
      case '-x':
      case '--maxTokens': {
        const value = readValue();
        // 0 selects the profile or built-in limit.
        parsed.maxTokens = /^\+?0+$/.test(value.trim()) ? undefined : parsePositiveInteger(flag, value);
        return true;
      }
      case '-a':
      case '--systemprompt':
        parsed.systemPrompt = readValue();
        return true;
      case '-u':
      case '--prompt':
        parsed.userPrompt = readValue();
        return true;
      case '-p':
      case '--promptfile':
        parsed.promptFile = readValue();
        return true;
      default:
        return false;
    }
  });
}

async function executePromptCommand(
  context: CliCommandContext,
  parsed: PromptCommandOptions,
  deps: PromptCommandDependencies,
): Promise<CommandResult> {
  if (parsed.help) {
    return {
      exitCode: 0,
      output: { kind: 'text', text: `${buildHelpMessage()}\n`, scope: 'info' },
    };
  }

  const input = await resolveCommandInput(deps.inputResolver, parsed.files, context.io);
  const filePrompts = await deps.promptFileLoader.load(parsed.promptFile);
  const prompts = applyPromptOverrides(filePrompts, {
    systemPrompt: parsed.systemPrompt,
    userPrompt: parsed.userPrompt,
  });

  const profile = await deps.configService.getProfile(parsed.profile);
  const connection = resolveConnection(parsed, profile, deps.env);
  const maxTokens = parsed.maxTokens ?? profile.maxTokens ?? DEFAULT_MAX_TOKENS;

  return runGeneration(context, deps, {
    format: parsed.format,
    input,
    profile,
    connection,
    maxTokens,
    systemPrompt: prompts.systemPrompt,
    userPrompt: prompts.userPrompt,
    execute: (llm, model) =>
      deps.completionExecutor(llm, input.text, {
        model,
        maxTokens,
        systemPrompt: prompts.systemPrompt,
        userPrompt: prompts.userPrompt,
      }),
  });
}

export function createPromptCommandHandler(deps: PromptCommandDependencies): CommandHandler {
  return async (context) => {
    const parsed = parsePromptCommandArgs(context.argv);
    return executePromptCommand(context, parsed, deps);
  };
}

export function createPromptCommandDescriptor(
  deps: PromptCommandDependencies,
): CommandDescriptor {
  return {
    name: 'prompt',
    summary: 'Send files or stdin with an optional prompt to the model',
    usage: 'prompt [options] [files...]',
    handler: createPromptCommandHandler(deps),
  };
}
