export * from './types';
export * from './tables';
export * from './lister';
export * from './checks';
export * from './classifier';
