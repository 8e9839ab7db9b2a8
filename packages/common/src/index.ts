export * from './types/broadcast';
export * from './types/member';
export * from './types/reaction';
