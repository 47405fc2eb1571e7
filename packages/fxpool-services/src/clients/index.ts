/**
 * External collaborator clients
 */

export * from './oracle/index.js';
export * from './ledger/index.js';
