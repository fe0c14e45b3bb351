export * from './document/rate-document.schemas.js';
export * from './document/rate-document-codec.js';
export * from './history/rate-history.schemas.js';
export * from './history/rate-history-log.js';
export * from './manager/rate-comparison.js';
export * from './manager/rate-manager.js';
export * from './store/rate-table-store.js';
export * from './table/rate-table.js';
