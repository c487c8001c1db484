export * from './compiler';
export * from './loader';
export * from './schema';
export * from './validator';
