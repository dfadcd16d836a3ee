/**
 * @rhodl-sync/workflows
 *
 * The sync workflow, the sheet sync strategies and their context.
 */

export * from './types.js';
export * from './sync/sheetSync.js';
export * from './sync/syncRhodlSeries.js';
export * from './context/createSyncContext.js';
