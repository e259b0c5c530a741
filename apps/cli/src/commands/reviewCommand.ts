import {
  REVIEW_MAX_TOKENS,
  REVIEW_SYSTEM_PROMPT,
  REVIEW_USER_PROMPT,
  type reviewCode,
} from '@claude3-cli/llm-core';

import type { CommandDescriptor, CommandHandler } from '../types.js';
import {
  CONNECTION_HELP,
  createCommonOptions,
  parseCommandArgs,
  resolveCommandInput,
  resolveConnection,
  runGeneration,
  type CommonCommandOptions,
  type GenerationCommandDependencies,
} from './generationSupport.js';

export interface ReviewCommandDependencies extends GenerationCommandDependencies {
  reviewExecutor: typeof reviewCode;
}

function buildHelpMessage(): string {
  return `Ask a Claude 3 model on Amazon Bedrock to review source code

Usage:
  llm-review [global-options] [review] [options] [files...]
  git diff | llm-review

The review points out problems, risks and future extensions, with fixes shown
as diffs. Without files the code is read from stdin.

Options:
${CONNECTION_HELP}`;
}

export function parseReviewCommandArgs(args: string[]): CommonCommandOptions {
  return parseCommandArgs(args, createCommonOptions());
}

export function createReviewCommandHandler(deps: ReviewCommandDependencies): CommandHandler {
  return async (context) => {
    const parsed = parseReviewCommandArgs(context.argv);

    if (parsed.help) {
      return {
        exitCode: 0,
        output: { kind: 'text', text: `${buildHelpMessage()}\n`, scope: 'info' },
      };
    }

    const input = await resolveCommandInput(deps.inputResolver, parsed.files, context.io);
    const profile = await deps.configService.getProfile(parsed.profile);
    const connection = resolveConnection(parsed, profile, deps.env);

    return runGeneration(context, deps, {
      format: parsed.format,
      input,
      profile,
      connection,
      maxTokens: REVIEW_MAX_TOKENS,
      systemPrompt: REVIEW_SYSTEM_PROMPT,
      userPrompt: REVIEW_USER_PROMPT,
      execute: (llm, model) =>
        deps.reviewExecutor(llm, input.text, { model, maxTokens: REVIEW_MAX_TOKENS }),
    });
  };
}

export function createReviewCommandDescriptor(
  deps: ReviewCommandDependencies,
): CommandDescriptor {
  return {
    name: 'review',
    summary: 'Review source files or stdin and suggest fixes as diffs',
    usage: 'review [options] [files...]',
    handler: createReviewCommandHandler(deps),
  };
}
