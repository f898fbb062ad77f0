/**
 * Firmware Framework for Arm function IDs, a sub-range of the
 * Standard Secure service. Only a few calls have a 64-bit form.
 */

const FFA_32_FUNCTIONS: ReadonlyMap<bigint, string> = new Map([
  [0x60n, 'FFA_ERROR_32'],
  [0x61n, 'FFA_SUCCESS_32'],
  [0x62n, 'FFA_INTERRUPT_32'],
  [0x63n, 'FFA_VERSION_32'],
  [0x64n, 'FFA_FEATURES_32'],
  [0x65n, 'FFA_RX_RELEASE_32'],
  [0x66n, 'FFA_RXTX_MAP_32'],
  [0x67n, 'FFA_RXTX_UNMAP_32'],
  [0x68n, 'FFA_PARTITION_INFO_GET_32'],
  [0x69n, 'FFA_ID_GET_32'],
  [0x6an, 'FFA_MSG_POLL_32'],
  [0x6bn, 'FFA_MSG_WAIT_32'],
  [0x6cn, 'FFA_YIELD_32'],
  [0x6dn, 'FFA_RUN_32'],
  [0x6en, 'FFA_MSG_SEND_32'],
  [0x6fn, 'FFA_MSG_SEND_DIRECT_REQ_32'],
  [0x70n, 'FFA_MSG_SEND_DIRECT_RESP_32'],
  [0x71n, 'FFA_MEM_DONATE_32'],
  [0x72n, 'FFA_MEM_LEND_32'],
  [0x73n, 'FFA_MEM_SHARE_32'],
  [0x74n, 'FFA_MEM_RETRIEVE_REQ_32'],
  [0x75n, 'FFA_MEM_RETRIEVE_RESP_32'],
  [0x76n, 'FFA_MEM_RELINQUISH_32'],
  [0x77n, 'FFA_MEM_RECLAIM_32'],
  [0x78n, 'FFA_MEM_OP_PAUSE'],
  [0x79n, 'FFA_MEM_OP_RESUME'],
  [0x7an, 'FFA_MEM_FRAG_RX_32'],
  [0x7bn, 'FFA_MEM_FRAG_TX_32'],
  [0x7cn, 'FFA_NORMAL_WORLD_RESUME'],
]);

const FFA_64_FUNCTIONS: ReadonlyMap<bigint, string> = new Map([
  [0x66n, 'FFA_RXTX_MAP_64'],
  [0x6fn, 'FFA_MSG_SEND_DIRECT_REQ_64'],
  [0x70n, 'FFA_MSG_SEND_DIRECT_RESP_64'],
  [0x71n, 'FFA_MEM_DONATE_64'],
  [0x72n, 'FFA_MEM_LEND_64'],
  [0x73n, 'FFA_MEM_SHARE_64'],
  [0x74n, 'FFA_MEM_RETRIEVE_REQ_64'],
]);

export function ffa32FunctionName(functionNumber: bigint): string | undefined {
  return FFA_32_FUNCTIONS.get(functionNumber);
}

export function ffa64FunctionName(functionNumber: bigint): string | undefined {
  return FFA_64_FUNCTIONS.get(functionNumber);
}
