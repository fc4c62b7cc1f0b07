export * from './redaction';
export * from './settings';
