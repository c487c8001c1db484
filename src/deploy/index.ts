export * from './deployment-controller';
export * from './health-checker';
export * from './registry-client';
export * from './runtime';
export * from './ssh-runtime';
export * from './target-lock';
