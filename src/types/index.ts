export * from './transactions';
export * from './signals';
export * from './thresholds';
export * from './store';
