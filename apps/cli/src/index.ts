import { runEntryPoint } from './main.js';

void runEntryPoint({
  name: 'claude3-cli',
  description: 'Send text to Claude 3 on Amazon Bedrock and print the streamed answer',
  defaultCommand: 'prompt',
});
