export * from './format.utils';
export * from './plot-generator';
