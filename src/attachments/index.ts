export * from './codec';
export * from './fetcher';
export * from './resolver';
