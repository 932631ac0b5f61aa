export * from './main';
export * from './output';
export * from './cli.utils';
