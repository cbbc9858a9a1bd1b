export * from './secret-validator';
export * from './url-guard';
