export * from './core/types';
export * from './core/tokenizer';
export * from './core/variables';
export * from './core/interpolate';
export * from './core/params';
export * from './core/discovery';
export * from './core/chain';
export * from './core/state';
export * from './core/machine';
export * from './core/events';
export * from './core/errors';
export * from './core/logger';
export * from './core/thinking';
export * from './core/usage';
export * from './core/paths';
export * from './core/resolver';
export * from './shell/config-schema';
export * from './shell/config';
export * from './shell/llm';
export * from './shell/providers';
export * from './shell/store';
export * from './shell/lock';
export * from './shell/prompt-files';
export * from './shell/chain-files';
export * from './shell/workspace';
