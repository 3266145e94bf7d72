export * from './User';
