export * from './accounts.js';
export * from './bills.js';
export * from './schemas.js';
export * from './transfers.js';
export type * from './types.js';
