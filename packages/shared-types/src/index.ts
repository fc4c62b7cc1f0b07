export * from './chat';
export * from './events';
export * from './llm';
export * from './settings';
