import { runEntryPoint } from './main.js';

void runEntryPoint({
  name: 'llm-review',
  description: 'Code review with Claude 3 on Amazon Bedrock',
  defaultCommand: 'review',
});
