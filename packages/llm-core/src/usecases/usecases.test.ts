import assert from 'node:assert/strict';
import test from 'node:test';

import type { LLMClient, LLMRequest } from '../llm/types.js';
import { reviewCode } from './codeReview.js';
import { completePrompt } from './promptCompletion.js';
import { REVIEW_SYSTEM_PROMPT, REVIEW_USER_PROMPT } from './reviewPrompts.js';

function createRecordingClient() {
  const requests: LLMRequest[] = [];
  const client: LLMClient = {
    async complete(req) {
      requests.push(req);
      return {
        text: 'answer',
        status: { stop_reason: 'end_turn', stop_sequence: null, output_tokens: 3 },
      };
    },
  };
  return { client, requests };
}

test('completePrompt prefixes the content with the base user prompt', async () => {
  const { client, requests } = createRecordingClient();

  const result = await completePrompt(client, 'file body', {
    model: 'model-a',
    maxTokens: 200,
    systemPrompt: 'system',
    userPrompt: 'Translate:',
  });

  assert.deepEqual(requests, [
    {
      model: 'model-a',
      prompt: 'Translate:\nfile body',
      systemPrompt: 'system',
      maxTokens: 200,
    },
  ]);
  assert.equal(result.text, 'answer');
  assert.equal(result.status?.output_tokens, 3);
  assert.equal(result.prompt, 'Translate:\nfile body');
});

test('completePrompt sends the content alone when no user prompt is configured', async () => {
  const { client, requests } = createRecordingClient();

  await completePrompt(client, 'just this', { model: 'model-a', maxTokens: 5 });

  assert.equal(requests[0].prompt, 'just this');
  assert.equal(requests[0].systemPrompt, undefined);
});

test('reviewCode sends the fixed review instructions followed by the code', async () => {
  const { client, requests } = createRecordingClient();

  const result = await reviewCode(client, 'let x = 1;', { model: 'model-b', maxTokens: 50000 });

  assert.equal(requests.length, 1);
  assert.equal(requests[0].systemPrompt, REVIEW_SYSTEM_PROMPT);
  assert.equal(requests[0].prompt, `${REVIEW_USER_PROMPT}\nlet x = 1;`);
  assert.equal(requests[0].maxTokens, 50000);
  assert.equal(result.text, 'answer');
});
