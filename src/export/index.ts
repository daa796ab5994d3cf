export * from './controlFlowGraph';
export * from './dependencyGraph';
export * from './dot';
export * from './parseGraph';
export * from './renderer';
