export * from './prompt';
export * from './parse';
export * from './validator';
