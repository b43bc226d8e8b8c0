export * from './scheduled-task';
