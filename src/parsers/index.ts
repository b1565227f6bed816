export * from './sender-registry';
export * from './transcript.parser';
