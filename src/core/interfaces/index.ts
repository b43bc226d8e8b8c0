// Interface and type exports
export * from './common.types';
export * from './storage.adapter';
export * from './event-dispatcher.interface';
