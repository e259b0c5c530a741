export const DEFAULT_MODEL = 'anthropic.claude-3-sonnet-20240229-v1:0';
export const DEFAULT_REGION = 'us-west-2';
export const DEFAULT_MAX_TOKENS = 50000;
