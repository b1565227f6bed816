export * from './constants';
export * from './errors';
export * from './date.utils';
export * from './text.utils';
export * from './file.utils';
