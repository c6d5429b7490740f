export * from './errors';
export * from './process';
export * from './compose';
export * from './config';
export * from './readiness';
export * from './environment';
export * from './bus';
export * from './scenario';
