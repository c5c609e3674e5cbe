export * from './contentGenerator';
export * from './llmContentGenerator';
export * from './prompts';
