export * from './analyze-estimate.dto';
export * from './column-selection.dto';
export * from './contractor.dto';
export * from './resume-estimate.dto';
