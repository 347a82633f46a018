export { RecordAuthority, type AuthorityOptions } from './kernel-core/Kernel.js';
export { PrincipalRegistry } from './kernel-core/L1/Identity.js';
export { ConsentMatrix } from './kernel-core/L2/Consent.js';
export { RecordLedger, type RecordFilter } from './kernel-core/L3/Ledger.js';
export { OperationJournal, type IJournalStore, type JournalEntry, type Operation } from './kernel-core/L5/Journal.js';
export { parseSnapshot, type AuthoritySnapshot, type ISnapshotStore } from './kernel-core/Snapshot.js';
export { ErrorCode, LedgerError, unwrap, type Outcome, type RejectionCode } from './kernel-core/Errors.js';
export { fingerprintOf } from './kernel-core/L0/Crypto.js';
export { SystemClock, ROLES, isRole } from './kernel-core/L0/Ontology.js';
export type { IClock, LedgerRecord, Principal, PrincipalID, Role, Fingerprint, RecordID, ConsentEntry } from './kernel-core/L0/Ontology.js';
export { SQLiteLedgerStore } from './infrastructure/persistence/SQLiteLedgerStore.js';
export { LedgerServer } from './server/Server.js';
export { loadConfig, type ServerConfig } from './server/Config.js';
