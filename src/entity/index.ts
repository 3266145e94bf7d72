export * from './user';
export * from './Snippet';
