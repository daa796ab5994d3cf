export * from './analysis';
export * from './export';
export * from './hlir';
export * from './io';
export * from './models';
