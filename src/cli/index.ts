export * from './cli';
export * from './graphs/generate';
export * from './graphs/graphs';
export * from './graphs/options';
