export * from './clockPort.js';
export * from './seriesSourcePort.js';
export * from './seriesCachePort.js';
export * from './sheetStorePort.js';
