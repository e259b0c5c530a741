import assert from 'node:assert/strict';
import { Readable } from 'node:stream';
import test from 'node:test';

import {
  LLMClientError,
  completePrompt,
  type BedrockConnectionOptions,
  type LLMClient,
  type LLMRequest,
} from '@claude3-cli/llm-core';

import type { ProfileProvider } from '../config/configService.js';
import type { ResolvedProfile } from '../config/types.js';
import { CliUsageError } from '../errors.js';
import { InputResolver } from '../inputResolver.js';
import type { PromptPair } from '../promptFileLoader.js';
import type { CliCommandContext, ProcessIO } from '../types.js';

import { createPromptCommandHandler, parsePromptCommandArgs } from './promptCommand.js';

function createIO(stdinText = ''): ProcessIO {
  return {
    writeStdout: () => {},
    writeStderr: () => {},
    setExitCode: () => {},
    stdin: () => Readable.from([Buffer.from(stdinText, 'utf-8')]),
  };
}

function createContext(
  argv: string[],
  overrides: { dryRun?: boolean; stdin?: string } = {},
): CliCommandContext {
  return {
    globals: {
      quiet: false,
      dryRun: overrides.dryRun ?? false,
      logFile: undefined,
    },
    argv,
    io: createIO(overrides.stdin),
  };
}

function createProfileProvider(profile: Partial<ResolvedProfile> = {}): ProfileProvider {
  return {
    async getProfile(name?: string) {
      return {
        name: name ?? 'default',
        model: 'anthropic.claude-3-sonnet-20240229-v1:0',
        log: { append: true },
        ...profile,
      };
    },
  };
}

function createHarness(overrides: {
  filePrompts?: PromptPair;
  profile?: Partial<ResolvedProfile>;
  env?: NodeJS.ProcessEnv;
  complete?: (req: LLMRequest) => Promise<{ text: string; status: null }>;
} = {}) {
  const requests: LLMRequest[] = [];
  const connections: BedrockConnectionOptions[] = [];
  const loadedPromptFiles: Array<string | undefined> = [];

  const client: LLMClient = {
    async complete(req) {
      requests.push(req);
      if (overrides.complete) {
        return overrides.complete(req);
      }
      return {
        text: 'Hello, world!',
        status: { stop_reason: 'end_turn', stop_sequence: null, output_tokens: 5 },
      };
    },
  };

  const handler = createPromptCommandHandler({
    inputResolver: new InputResolver({
      statImpl: async (path) => ({ isFile: () => !path.startsWith('missing') }),
      readFileImpl: async (path) => new TextEncoder().encode(`[${path}]`),
    }),
    configService: createProfileProvider(overrides.profile),
    llmFactory: (options) => {
      connections.push(options);
      return client;
    },
    env: overrides.env ?? {},
    promptFileLoader: {
      async load(path) {
        loadedPromptFiles.push(path);
        return path ? overrides.filePrompts ?? {} : {};
      },
    },
    completionExecutor: completePrompt,
  });

  return { handler, requests, connections, loadedPromptFiles };
}

test('prompt command sends the files with the base prompt and prints the text', async () => {
  const { handler, requests } = createHarness();

  const result = await handler(
    createContext(['-u', 'Summarize:', '-a', 'Be brief.', 'a.txt', 'missing.txt', 'b.txt']),
  );

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.output, { kind: 'text', text: 'Hello, world!\n' });
  assert.deepEqual(requests, [
    {
      model: 'anthropic.claude-3-sonnet-20240229-v1:0',
      prompt: 'Summarize:\n[a.txt][b.txt]',
      systemPrompt: 'Be brief.',
      maxTokens: 50000,
    },
  ]);
  assert.equal(result.telemetry?.skippedFiles, 1);
  assert.equal(result.telemetry?.outputTokens, 5);
  assert.equal(result.telemetry?.stopReason, 'end_turn');
});

test('prompt command reads stdin when no files are given', async () => {
  const { handler, requests } = createHarness();

  await handler(createContext([], { stdin: 'from stdin\n' }));

  assert.equal(requests[0].prompt, 'from stdin\n');
  assert.equal(requests[0].systemPrompt, undefined);
});

test('prompt file values are overridden by explicit flags', async () => {
  const { handler, requests, loadedPromptFiles } = createHarness({
    filePrompts: { systemPrompt: 'file system', userPrompt: 'file user' },
  });

  await handler(
    createContext(['-p', 'prompt.json', '--prompt', 'flag user', '--systemprompt', 'flag system', 'a.txt']),
  );

  assert.deepEqual(loadedPromptFiles, ['prompt.json']);
  assert.equal(requests[0].systemPrompt, 'flag system');
  assert.equal(requests[0].prompt, 'flag user\n[a.txt]');
});

test('prompt file supplies prompts when no flags are given', async () => {
  const { handler, requests } = createHarness({ filePrompts: { userPrompt: 'Review:' } });

  await handler(createContext(['--promptfile=prompt.json', 'a.txt']));

  assert.equal(requests[0].systemPrompt, undefined);
  assert.equal(requests[0].prompt, 'Review:\n[a.txt]');
});

test('explicit keys and region build a static-credential connection', async () => {
  const { handler, connections, requests } = createHarness();

  await handler(
    createContext([
      '-k', 'test-key', '-s', 'test-secret', '-r', 'eu-west-3',
      '-m', 'anthropic.claude-3-haiku-20240307-v1:0', '-x', '1024', 'a.txt',
    ]),
  );

  assert.deepEqual(connections, [
    { accessKeyId: 'test-key', secretAccessKey: 'test-secret', region: 'eu-west-3' },
  ]);
  assert.equal(requests[0].model, 'anthropic.claude-3-haiku-20240307-v1:0');
  assert.equal(requests[0].maxTokens, 1024);
});

test('keys default to the environment and region and tokens to the profile', async () => {
  const { handler, connections, requests } = createHarness({
    env: { AWS_ACCESS_KEY_ID: 'env-key', AWS_SECRET_ACCESS_KEY: 'env-secret' },
    profile: { region: 'ap-northeast-1', maxTokens: 2048 },
  });

  await handler(createContext(['a.txt']));

  assert.deepEqual(connections, [
    { accessKeyId: 'env-key', secretAccessKey: 'env-secret', region: 'ap-northeast-1' },
  ]);
  assert.equal(requests[0].maxTokens, 2048);
});

test('a zero token limit falls back to the profile value', async () => {
  const { handler, requests } = createHarness({ profile: { maxTokens: 2048 } });

  await handler(createContext(['-x', '0', 'a.txt']));

  assert.equal(requests[0].maxTokens, 2048);
  assert.equal(parsePromptCommandArgs(['--maxTokens=0']).maxTokens, undefined);
});

test('without keys the connection falls back to the default credential chain', async () => {
  const { handler, connections } = createHarness();

  await handler(createContext(['a.txt']));

  assert.deepEqual(connections, [
    { accessKeyId: undefined, secretAccessKey: undefined, region: 'us-west-2' },
  ]);
});

test('client errors are printed with the status and keep exit code 0', async () => {
  const { handler } = createHarness({
    complete: async () => {
      throw new LLMClientError('Access denied', { errorName: 'AccessDeniedException', httpStatus: 403 });
    },
  });

  const result = await handler(createContext(['a.txt']));

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.output, {
    kind: 'text',
    text: 'A client error occurred: Access denied\nnull\n',
  });
  assert.equal(result.diagnostic, 'A client error occurred: Access denied');
  assert.equal(result.telemetry?.errorCode, 'E_CLIENT');
});

test('client errors are reported inside the JSON document with --format json', async () => {
  const { handler } = createHarness({
    complete: async () => {
      throw new LLMClientError('Access denied', { errorName: 'AccessDeniedException' });
    },
  });

  const result = await handler(createContext(['--format', 'json', 'a.txt']));

  assert.equal(result.exitCode, 0);
  assert.deepEqual(result.output, {
    kind: 'json',
    data: {
      text: null,
      status: null,
      error: { code: 'E_CLIENT', name: 'AccessDeniedException', message: 'Access denied' },
    },
  });
  assert.equal(result.diagnostic, 'A client error occurred: Access denied');
});

test('other failures propagate to the application', async () => {
  const { handler } = createHarness({
    complete: async () => {
      throw new Error('Region is missing');
    },
  });

  await assert.rejects(handler(createContext(['a.txt'])), /Region is missing/);
});

test('json format includes the status and metrics', async () => {
  const { handler } = createHarness();

  const result = await handler(createContext(['--format', 'json', 'a.txt', 'missing.txt']));

  const { output } = result;
  assert.ok(output?.kind === 'json');
  const data: unknown = output.data;
  assert.ok(typeof data === 'object' && data !== null);
  assert.ok('text' in data && 'status' in data && 'metrics' in data);
  assert.equal(data.text, 'Hello, world!');
  assert.deepEqual(data.status, { stop_reason: 'end_turn', stop_sequence: null, output_tokens: 5 });
  assert.ok(typeof data.metrics === 'object' && data.metrics !== null && 'skippedFiles' in data.metrics);
  assert.deepEqual(data.metrics.skippedFiles, ['missing.txt']);
});

test('dry run resolves the request without building a client', async () => {
  const { handler, connections, requests } = createHarness();

  const result = await handler(createContext(['-u', 'Q:', 'a.txt'], { dryRun: true }));

  assert.equal(result.exitCode, 0);
  assert.equal(connections.length, 0);
  assert.equal(requests.length, 0);
  const { output } = result;
  assert.ok(output?.kind === 'dry-run');
  assert.equal(output.details?.model, 'anthropic.claude-3-sonnet-20240229-v1:0');
  assert.equal(output.details?.region, 'us-west-2');
  assert.equal(output.details?.credentials, 'default-chain');
  assert.equal(output.details?.userPromptChars, 'Q:\n[a.txt]'.length);
});

test('help is returned without reading input', async () => {
  const { handler, requests } = createHarness();

  const result = await handler(createContext(['--help']));

  assert.equal(result.exitCode, 0);
  const { output } = result;
  assert.ok(output?.kind === 'text');
  assert.equal(output.scope, 'info');
  assert.ok(output.text.includes('-p, --promptfile <path>'));
  assert.equal(requests.length, 0);
});

test('parsePromptCommandArgs validates options', () => {
  assert.throws(() => parsePromptCommandArgs(['--bogus']), CliUsageError);
  assert.throws(() => parsePromptCommandArgs(['-m']), /-m option requires a value/);
  assert.throws(() => parsePromptCommandArgs(['-x', 'many']), /-x expects a positive integer/);
  assert.throws(() => parsePromptCommandArgs(['-x', '-3']), /-x option requires a value/);
  assert.throws(() => parsePromptCommandArgs(['-x', '1.5']), /-x expects a positive integer/);
  assert.throws(() => parsePromptCommandArgs(['--format', 'yaml']), /--format must be/);
});

test('parsePromptCommandArgs keeps paths after -- as files', () => {
  const parsed = parsePromptCommandArgs(['-x', '+12', '--', '-notes.txt', 'b.txt']);

  assert.equal(parsed.maxTokens, 12);
  assert.deepEqual(parsed.files, ['-notes.txt', 'b.txt']);
});
