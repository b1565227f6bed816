export * from './cli.utils';
export * from './file-processor';
export * from './output';
export * from './main';
