/**
 * Lockstake — Configuration
 *
 * Reads settings from the environment (and `.env` via dotenv).
 * Every value has a local-dev default so the server starts with no
 * chain connection at all.
 */

import 'dotenv/config';

function bool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return value === 'true' || value === '1';
}

function bigintOf(value: string | undefined, fallback: bigint): bigint {
  if (!value) return fallback;
  try {
    return BigInt(value);
  } catch {
    throw new Error(`Invalid integer in environment: "${value}"`);
  }
}

export const config = {
  port: parseInt(process.env.PORT || '3001', 10),

  staking: {
    // Fixed at construction; there is no admin update path.
    rewardConversionRate: bigintOf(process.env.REWARD_CONVERSION_RATE, 1n),
    custodyAccount: process.env.CUSTODY_ACCOUNT || '0x000000000000000000000000000000000000dEaD',
  },

  rewardToken: {
    // Empty → in-memory token minted to the custody account.
    address: process.env.REWARD_TOKEN_ADDRESS || '',
    symbol: process.env.REWARD_TOKEN_SYMBOL || 'RWD',
    initialSupply: bigintOf(process.env.REWARD_TOKEN_SUPPLY, 1_000_000n * 10n ** 18n),
  },

  chain: {
    rpcUrl: process.env.CHAIN_RPC_URL || 'http://localhost:8545',
    // Set → principal is returned with real wallet transfers.
    operatorPrivateKey: process.env.OPERATOR_PRIVATE_KEY || '',
  },

  faucetEnabled: bool(process.env.FAUCET_ENABLED, process.env.NODE_ENV !== 'production'),
  logCalls: bool(process.env.LOG_CALLS, true),
} as const;

export type AppConfig = typeof config;
