export * from './export.utils';
