export * from './errors';
export * from './grid';
export * from './parser';
export * from './schema';
