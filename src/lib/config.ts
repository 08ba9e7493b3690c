/**
 * Arena Configuration
 *
 * Arena parameters parsed from the environment with zod.
 * Amounts are decimal strings of base units. Addresses come out lowercased,
 * and token collaborators see the arena and treasury accounts in that form.
 */

import { z } from "zod";
import { getEnv } from "./env.js";
import { amountSchema, addressSchema } from "./validation.js";

export const ArenaConfigSchema = z.object({
  /** Account the arena holds funds under */
  arenaAddress: addressSchema,
  /** Receives the battle fee and arena sweeps */
  treasury: addressSchema,
  /** Incentive tokens split between stakers each epoch */
  stakerIncentivePerEpoch: amountSchema,
  /** Incentive tokens split between voters each epoch */
  voterIncentivePerEpoch: amountSchema,
  /** Last epoch that accrues incentive rewards */
  endEpochOfIncentiveRewards: z.coerce.number().int().nonnegative(),
});

export type ArenaConfig = z.infer<typeof ArenaConfigSchema>;

/**
 * Load arena config from ARENA_* variables
 */
export function loadArenaConfig(): ArenaConfig {
  const parsed = ArenaConfigSchema.safeParse({
    arenaAddress: getEnv("ARENA_ADDRESS"),
    treasury: getEnv("ARENA_TREASURY"),
    stakerIncentivePerEpoch: getEnv("ARENA_STAKER_INCENTIVE_PER_EPOCH", false) || "0",
    voterIncentivePerEpoch: getEnv("ARENA_VOTER_INCENTIVE_PER_EPOCH", false) || "0",
    endEpochOfIncentiveRewards: getEnv("ARENA_END_EPOCH_OF_INCENTIVE_REWARDS", false) || "0",
  });
  if (!parsed.success) {
    throw new Error(`Invalid arena configuration: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`);
  }
  return parsed.data;
}
