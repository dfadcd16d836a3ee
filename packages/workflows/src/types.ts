import type { ClockPort, SeriesCachePort, SeriesSourcePort, SheetStorePort } from '@rhodl-sync/core';
import type { Logger } from '@rhodl-sync/utils';

/**
 * Logger surface workflows use; the utils Logger satisfies it
 */
export type WorkflowLogger = Pick<Logger, 'info' | 'warn' | 'error' | 'debug'>;

/**
 * External dependencies of the sync workflow
 */
export type SyncPorts = {
  source: SeriesSourcePort;
  cache: SeriesCachePort;
  sheet: SheetStorePort;
  clock: ClockPort;
};

export type SyncWorkflowContext = {
  ports: SyncPorts;
  logger: WorkflowLogger;
  ids: {
    newRunId: () => string;
  };
};
