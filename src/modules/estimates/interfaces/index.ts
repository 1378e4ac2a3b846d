export * from './estimate.interface';
export * from './report.interface';
