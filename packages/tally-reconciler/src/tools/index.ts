export * from './validation-tools';
export * from './registry';
