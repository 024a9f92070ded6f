export * from './engine';
export * from './browser';
export * from './site';
export * from './config';
export * from './monitoring';
export { playwrightSessionFactory, createBatchDriver } from './runner';
