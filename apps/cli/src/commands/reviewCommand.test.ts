import assert from 'node:assert/strict';
import { Readable } from 'node:stream';
import test from 'node:test';

import {
  REVIEW_SYSTEM_PROMPT,
  REVIEW_USER_PROMPT,
  reviewCode,
  type LLMClient,
  type LLMRequest,
} from '@claude3-cli/llm-core';

import type { ProfileProvider } from '../config/configService.js';
import { CliUsageError } from '../errors.js';
import { InputResolver } from '../inputResolver.js';
import type { CliCommandContext } from '../types.js';

import { createReviewCommandHandler, parseReviewCommandArgs } from './reviewCommand.js';

function createContext(argv: string[], stdin = ''): CliCommandContext {
  return {
    globals: { quiet: false, dryRun: false },
    argv,
    io: {
      writeStdout: () => {},
      writeStderr: () => {},
      setExitCode: () => {},
      stdin: () => Readable.from([Buffer.from(stdin, 'utf-8')]),
    },
  };
}

const profiles: ProfileProvider = {
  async getProfile(name?: string) {
    return {
      name: name ?? 'default',
      region: 'us-east-1',
      model: 'anthropic.claude-3-opus-20240229-v1:0',
      maxTokens: 10,
      log: { append: true },
    };
  },
};

function createHarness() {
  const requests: LLMRequest[] = [];
  const client: LLMClient = {
    async complete(req) {
      requests.push(req);
      return {
        text: '- let x = 1\n+ const x = 1',
        status: { stop_reason: 'end_turn', stop_sequence: null, output_tokens: 12 },
      };
    },
  };

  const handler = createReviewCommandHandler({
    inputResolver: new InputResolver({
      statImpl: async () => ({ isFile: () => true }),
      readFileImpl: async (path) => new TextEncoder().encode(`// ${path}\n`),
    }),
    configService: profiles,
    llmFactory: () => client,
    env: {},
    reviewExecutor: reviewCode,
  });

  return { handler, requests };
}

test('review command sends the fixed review prompts with the code', async () => {
  const { handler, requests } = createHarness();

  const result = await handler(createContext(['main.ts', 'util.ts']));

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.output, { kind: 'text', text: '- let x = 1\n+ const x = 1\n' });
  assert.deepEqual(requests, [
    {
      model: 'anthropic.claude-3-opus-20240229-v1:0',
      prompt: `${REVIEW_USER_PROMPT}\n// main.ts\n// util.ts\n`,
      systemPrompt: REVIEW_SYSTEM_PROMPT,
      maxTokens: 50000,
    },
  ]);
});

test('review command reads code from stdin without files', async () => {
  const { handler, requests } = createHarness();

  await handler(createContext(['-m', 'anthropic.claude-3-haiku-20240307-v1:0'], 'diff --git a b\n'));

  assert.equal(requests[0].model, 'anthropic.claude-3-haiku-20240307-v1:0');
  assert.equal(requests[0].prompt, `${REVIEW_USER_PROMPT}\ndiff --git a b\n`);
});

test('review command does not accept prompt options', () => {
  assert.throws(() => parseReviewCommandArgs(['-x', '100']), CliUsageError);
  assert.throws(() => parseReviewCommandArgs(['--prompt', 'x']), /Unknown option: --prompt/);
});

test('review command help lists connection options', async () => {
  const { handler } = createHarness();

  const result = await handler(createContext(['-h']));

  const { output } = result;
  assert.ok(output?.kind === 'text');
  assert.ok(output.text.includes('-k, --accessKey <id>'));
  assert.ok(!output.text.includes('--maxTokens'));
});
