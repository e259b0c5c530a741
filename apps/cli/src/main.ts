import process from 'node:process';

import {
  BedrockAnthropicClient,
  completePrompt,
  reviewCode,
} from '@claude3-cli/llm-core';

import { createCliApplication } from './cliApplication.js';
import { CommandRouter } from './commandRouter.js';
import { createConfigCommandDescriptor } from './commands/configCommand.js';
import type { LlmFactory } from './commands/generationSupport.js';
import { createPromptCommandDescriptor } from './commands/promptCommand.js';
import { createReviewCommandDescriptor } from './commands/reviewCommand.js';
import { resolveConfigFilePath } from './config/configPaths.js';
import { ConfigService } from './config/configService.js';
import { ConfigStore } from './config/configStore.js';
import { InputResolver } from './inputResolver.js';
import { createNodeProcessIO } from './processIo.js';
import { PromptFileLoader } from './promptFileLoader.js';

export interface EntryPointOptions {
  name: string;
  description: string;
  defaultCommand: 'prompt' | 'review';
}

const bedrockLlmFactory: LlmFactory = (options) => BedrockAnthropicClient.fromConnection(options);

export async function runEntryPoint(options: EntryPointOptions): Promise<void> {
  const configService = new ConfigService(new ConfigStore(resolveConfigFilePath()));
  const inputResolver = new InputResolver();

  const router = new CommandRouter();
  router.register(
    createPromptCommandDescriptor({
      inputResolver,
      configService,
      llmFactory: bedrockLlmFactory,
      env: process.env,
      promptFileLoader: new PromptFileLoader(),
      completionExecutor: completePrompt,
    }),
  );
  router.register(
    createReviewCommandDescriptor({
      inputResolver,
      configService,
      llmFactory: bedrockLlmFactory,
      env: process.env,
      reviewExecutor: reviewCode,
    }),
  );
  router.register(createConfigCommandDescriptor({ configService }));

  const app = createCliApplication({
    name: options.name,
    description: options.description,
    router,
    defaultCommand: options.defaultCommand,
  });

  const io = createNodeProcessIO(process);
  const exitCode = await app.run(process.argv, io);

  if (typeof process.exitCode !== 'number') {
    process.exitCode = exitCode;
  }
}
