export * from './message.types';
export * from './statistics.types';
export * from './report.types';
