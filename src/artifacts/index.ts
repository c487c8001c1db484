export * from './artifact-store';
export * from './http-backend';
export * from './memory-backend';
