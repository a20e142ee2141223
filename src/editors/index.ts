export * from './types';
export * from './timecode';
export * from './fileDropEditor';
export * from './resolve';
export * from './premiere';
export * from './registry';
