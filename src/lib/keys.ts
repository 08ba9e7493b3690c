/**
 * KV Keyspace Helpers
 *
 * Centralizes all key generation logic for consistency.
 * Keys are prefixed with cfg.prefix (e.g., "arena:")
 */

/**
 * Current epoch summary JSON blob
 */
export function kEpochJson(): string {
  return "epoch:current:json";
}

/**
 * Summary of a past epoch, kept after the epoch advances
 */
export function kEpochHistoryJson(epoch: number): string {
  return `epoch:${epoch}:json`;
}

export function kStakerJson(id: number): string {
  return `staker:${id}:json`;
}

export function kVotingJson(id: number): string {
  return `voting:${id}:json`;
}
