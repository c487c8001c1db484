export * from './executor';
export * from './stage-registry';
export * from './stage-runner';
export * from './state-machine';
