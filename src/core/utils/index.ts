export * from './canonical-json';
export * from './timeout';
export * from './clock';
