/**
 * @rhodl-sync/api-clients - API Client Package
 */

export * from './base-client.js';
export * from './coinglass-client.js';
