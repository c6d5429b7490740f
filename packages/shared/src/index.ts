export * from './json';
export * from './envConfig';
export * from './logger';
export * from './configLayers';
export * from './overrides';
export * from './sessions';
