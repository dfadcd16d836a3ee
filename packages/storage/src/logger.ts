/**
 * Storage Package Logger
 * ======================
 * Logger for the storage package with namespace '@rhodl-sync/storage'
 */

import { createPackageLogger } from '@rhodl-sync/utils';

export const logger = createPackageLogger('@rhodl-sync/storage');
