export * from './healthCheck';
export * from './highlight';
export * from './permissions';
export * from './snippet';
