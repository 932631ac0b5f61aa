export * from './records.parser';
export * from './record.filter';
export * from './network.filter';
export * from './person.loader';
