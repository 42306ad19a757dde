export * from './anthropic';
export * from './openai';
