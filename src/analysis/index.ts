export * from './statistics.accumulator';
export * from './report.generator';
export * from './plot-data.generator';
