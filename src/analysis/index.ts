export * from './analysis';
export * from './bitSet';
export * from './graph';
export * from './graphBuilder';
export * from './overlap';
export * from './reducer';
export * from './scheduler';
export * from './topo';
export * from './types';
