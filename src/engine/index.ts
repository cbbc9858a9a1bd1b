export * from './retry';
export * from './state-machine';
export * from './task-registry';
export * from './pipeline-controller';
