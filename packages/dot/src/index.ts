export * from './dot';
export * from './renderer';
export * from './save';
