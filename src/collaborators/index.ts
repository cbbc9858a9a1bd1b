export * from './code-generation';
export * from './repository';
export * from './pages';
export * from './in-memory-host';
export * from './template-generator';
