/**
 * Pipewright: a CI/CD pipeline execution engine.
 *
 * Public exports for programmatic use. The `pipeline` binary lives in
 * ./cli; the HTTP API in ./server.
 */

export { createEngine, Engine, EngineOverrides } from './bootstrap';
export { EngineConfig, LockMode, DEFAULT_CONFIG, DEFAULT_STAGE_POLICY, loadConfig } from './config';
export { createApp, startServer } from './server';
export * from './artifacts';
export * from './data-plane';
export * from './deploy';
export * from './domain';
export * from './dsl';
export * from './engine';
export * from './logger';
export * from './process';
export * from './stages';
export * from './storage';
