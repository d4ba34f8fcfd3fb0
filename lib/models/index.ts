export * from './adapter';
export * from './common';
export * from './events';
export * from './interactivity';
export * from './operation';
export * from './package';
export * from './process';
export * from './record';
export * from './transfer';
export * from './ui';
