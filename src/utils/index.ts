export * from './constants';
export * from './errors';
export * from './log.utils';
export * from './date.utils';
export * from './config.utils';
export * from './interval.utils';
export * from './file.utils';
