export * from './calendar';
export * from './envConfig';
export * from './logger';
export * from './postgres';
export * from './streams';
