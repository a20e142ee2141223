export * from './types';
export * from './launchers';
export * from './factory';
