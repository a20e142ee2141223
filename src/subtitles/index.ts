export * from './types';
export * from './errors';
export * from './cueParser';
export * from './subtitleIndex';
export * from './showSession';
