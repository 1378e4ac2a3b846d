export * from './aggregator';
export * from './categorizer';
export * from './column-resolver';
export * from './delegator';
export * from './estimate-pipeline';
export * from './format';
export * from './raw-table';
export * from './rounding';
export * from './row-normalizer';
export * from './run-config';
export * from './trade-keywords';
