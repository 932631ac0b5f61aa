export * from './record.types';
export * from './indicator.types';
export * from './report.types';
