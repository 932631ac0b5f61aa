export * from './record.factory';
export * from './summary.reducer';
export * from './entropy.reducer';
export * from './conversation.segmenter';
export * from './grouping.engine';
export * from './home.locator';
export * from './battery.computer';
export * from './indicators';
