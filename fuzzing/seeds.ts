/**
 * Seed corpus of register values for mutation-based fuzzing.
 * Each seed decodes successfully and exercises a different layout.
 */

/** ESR seeds: one per interesting ISS layout. */
export const ESR_SEEDS: readonly bigint[] = [
  0x0n,
  0x96000050n, // data abort, no valid instruction syndrome
  0x97523050n, // data abort with ISV, SAS and SET
  0x82001e10n, // instruction abort, external abort with SET
  0x1f300000n, // SVE trap with condition code
  0x2a000002n, // LD64B or ST64B trapped
  0x6234f841n, // MRS x2, CNTVCT_EL0
  0xbe000011n, // SError, asynchronous
  0xf20003e8n, // BRK #1000
  0x56000001n, // SVC #1
];

export const MIDR_SEEDS: readonly bigint[] = [
  0x410fd083n,
  0x610f0000n,
  0x00000000n,
];

export const SMCCC_SEEDS: readonly bigint[] = [
  0x84000000n, // PSCI_VERSION
  0x84000063n, // FFA_VERSION
  0xc4000071n, // FFA_MEM_DONATE_64
  0x80000000n, // SMCCC_VERSION
  0xc5000020n, // PV time
  0x02000000n, // yielding call
];
