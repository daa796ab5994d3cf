export * from './errors';
export * from './logLevel';
