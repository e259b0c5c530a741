import { readFile, stat } from 'node:fs/promises';

import { PromptFileError } from './errors.js';
import { MISSING_CODES, UNREADABLE_CODES, errorCode } from './inputResolver.js';

export interface PromptPair {
  systemPrompt?: string;
  userPrompt?: string;
}

export interface PromptFileLoaderDependencies {
  readFileImpl?: (path: string) => Promise<string>;
  isFileImpl?: (path: string) => Promise<boolean>;
}

async function isRegularFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch (error) {
    const code = errorCode(error);
    if (code && (MISSING_CODES.has(code) || UNREADABLE_CODES.has(code))) {
      return false;
    }
    throw error;
  }
}

function readOptionalString(
  document: Record<string, unknown>,
  key: string,
  path: string,
): string | undefined {
  const value = document[key];

  if (value === undefined || value === null) {
    return undefined;
  }

  if (typeof value !== 'string') {
    throw new PromptFileError(path, `"${key}" must be a string`);
  }

  return value;
}

/**
 * Reads `{ "system_prompt": "...", "user_prompt": "..." }`. A missing or
 * inaccessible file, a missing key or a `null` value leaves the prompt unset.
 */
export class PromptFileLoader {
  private readonly readFileImpl: (path: string) => Promise<string>;

  private readonly isFileImpl: (path: string) => Promise<boolean>;

  constructor(deps: PromptFileLoaderDependencies = {}) {
    this.readFileImpl = deps.readFileImpl ?? ((path) => readFile(path, 'utf-8'));
    this.isFileImpl = deps.isFileImpl ?? isRegularFile;
  }

  async load(path?: string): Promise<PromptPair> {
    if (!path || !(await this.isFileImpl(path))) {
      return {};
    }

    const content = await this.readFileImpl(path);
    let document: unknown;

    try {
      document = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new PromptFileError(path, `invalid JSON (${reason})`);
    }

    if (typeof document !== 'object' || document === null || Array.isArray(document)) {
      throw new PromptFileError(path, 'expected a JSON object');
    }

    const fields: Record<string, unknown> = { ...document };

    return {
      systemPrompt: readOptionalString(fields, 'system_prompt', path),
      userPrompt: readOptionalString(fields, 'user_prompt', path),
    };
  }
}

/** Explicit flags replace the file's values; they are never merged. */
export function applyPromptOverrides(filePrompts: PromptPair, overrides: PromptPair): PromptPair {
  return {
    systemPrompt: overrides.systemPrompt ?? filePrompts.systemPrompt,
    userPrompt: overrides.userPrompt ?? filePrompts.userPrompt,
  };
}
