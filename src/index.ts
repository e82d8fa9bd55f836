export { VestingKernel } from './kernel-core/Kernel.js';
export type { KernelOptions, KernelPorts } from './kernel-core/Kernel.js';
export { ErrorCode, KernelError, isKernelError } from './kernel-core/Errors.js';
export * from './kernel-core/L0/Ontology.js';
export { ManualClock, SystemClock, StaticAuthorization } from './kernel-core/L0/Ports.js';
export type { Authorization, Clock, FundsLedger } from './kernel-core/L0/Ports.js';
export { ESCROW_INVARIANTS, checkInvariants } from './kernel-core/L0/Invariants.js';
export type { Invariant, Rejection } from './kernel-core/L0/Invariants.js';
export { ReplayEngine } from './kernel-core/L0/Replay.js';
export * as Schedule from './kernel-core/L1/Schedule.js';
export { EscrowStore, genesisState } from './kernel-core/L2/State.js';
export type { AllocationReceipt } from './kernel-core/L3/Allocation.js';
export type { EscrowSummary, RecipientView } from './kernel-core/L3/Projections.js';
export type { RecipientSettlement, SeizureReceipt } from './kernel-core/L4/Termination.js';
export { AuditLog } from './kernel-core/L5/Audit.js';
export type { Evidence, IEventStore } from './kernel-core/L5/Audit.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { InMemoryFundsLedger } from './infrastructure/ledger/InMemoryFundsLedger.js';
export { VestingServer, bootstrap } from './server/Server.js';
export { loadConfig } from './Platform/Config.js';
export type { Config } from './Platform/Config.js';
