export * from './types';
export * from './errors';
export * from './nameNormalizer';
export * from './fileMatcher';
export * from './scanner';
export * from './libraryService';
