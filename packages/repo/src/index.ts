export const name = '@gitree/repo';

export * from './classifier';
