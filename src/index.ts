export { NftBattleArena, type ArenaDependencies, type ActivePositions } from "./arena/battle-arena.js";
export { NftStakingPosition, type StakedNft, type UnstakeResult } from "./arena/staking-positions.js";
export { NftVotingPosition } from "./arena/voting-positions.js";
export { PositionToken } from "./arena/position-token.js";
export { CollectionRegistry } from "./arena/collection-registry.js";
export {
  ZooFunctions,
  DEFAULT_DURATIONS,
  DEFAULT_LEAGUE_THRESHOLDS,
  DEFAULT_LEAGUE_ZOO_REWARDS,
  type PolicyOptions,
} from "./arena/policy.js";
export { ArenaError, errorKind, isArenaError, type ArenaErrorCode, type ArenaErrorKind } from "./arena/errors.js";
export { WAD } from "./arena/math.js";
export type {
  Checkpointable,
  CollectionRegistryPort,
  FungibleToken,
  NonFungibleToken,
  RandomnessPolicy,
  VaultAdapter,
} from "./arena/interfaces.js";
export * from "./types/arena.js";
export type * from "./types/dto.js";
export { loadArenaConfig, type ArenaConfig } from "./lib/config.js";
export { publishArenaSnapshot, toArenaSnapshot, type ArenaSnapshot } from "./lib/snapshot.js";
