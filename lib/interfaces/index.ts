export * from './collaborator-interfaces';
export * from './event-interface';
export * from './fs-interface';
export * from './http-interface';
export * from './logger-interface';
export * from './process-interface';
export * from './progress-interface';
export * from './shell-interface';
