/**
 * @rhodl-sync/core
 *
 * Domain types, pure series functions and port interfaces.
 * This package has no dependencies on other @rhodl-sync packages.
 */

export * from './domain/series.js';
export * from './series-filter.js';
export * from './ports/index.js';
