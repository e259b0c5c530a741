import { LLMClientError, StreamDecodeError } from '@claude3-cli/llm-core';

import { InputResolveError } from './inputResolver.js';
import { CliUsageError, PromptFileError } from './errors.js';
import type { CommandOutput } from './types.js';

export interface MappedError {
  exitCode: number;
  output: CommandOutput;
  errorCode: string;
}

export class ErrorDomainMapper {
  private readonly programName: string;

  constructor(programName = 'claude3-cli') {
    this.programName = programName;
  }

  map(error: unknown): MappedError {
    if (error instanceof CliUsageError) {
      return this.build('E_USAGE', error.message, 2, [
        `Run '${this.programName} --help' to list the available options`,
      ]);
    }

    if (error instanceof InputResolveError) {
      return this.build('E_INPUT', error.message, 1, ['Input files and stdin must be UTF-8 text']);
    }

    if (error instanceof PromptFileError) {
      return this.build('E_PROMPT_FILE', error.message, 1, [
        'The prompt file must be a JSON object with optional "system_prompt" and "user_prompt" strings',
      ]);
    }

    if (isConfigError(error)) {
      return this.build('CONFIG_ERROR', error.message, 1, [
        `Run '${this.programName} config list' to check your profiles`,
      ]);
    }

    if (error instanceof LLMClientError) {
      return this.build('E_CLIENT', error.message, 1);
    }

    if (error instanceof StreamDecodeError) {
      return this.build('E_STREAM_DECODE', error.message, 1);
    }

    if (error instanceof Error) {
      return this.build('E_UNEXPECTED', error.message, 1);
    }

    return this.build('E_UNEXPECTED', String(error), 1);
  }

  private build(
    code: string,
    message: string,
    exitCode: number,
    suggestions: string[] = [],
  ): MappedError {
    return {
      exitCode,
      errorCode: code,
      output: {
        kind: 'error',
        code,
        message,
        suggestions,
      },
    };
  }
}

function isConfigError(error: unknown): error is Error {
  return error instanceof Error && error.name === 'ConfigError';
}
