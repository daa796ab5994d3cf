export * from './expression';
export * from './fieldAccess';
export * from './fieldId';
export * from './frontend';
export * from './loader';
export * from './orderedMap';
export * from './primitives';
export * from './types';
