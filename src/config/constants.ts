// ─── Token Mints ─────────────────────────────────────────────
export const WSOL_MINT = 'So11111111111111111111111111111111111111112';
export const USDC_MINT = 'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v';
export const USDT_MINT = 'Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB';
export const SYSTEM_PROGRAM = '11111111111111111111111111111111';
export const TOKEN_PROGRAM = 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA';

/** Base assets that are never a purchase target. */
export const NON_TARGET_MINTS: ReadonlySet<string> = new Set([
  WSOL_MINT,
  USDC_MINT,
  USDT_MINT,
  SYSTEM_PROGRAM,
]);

// ─── Address Shape ───────────────────────────────────────────
export const BASE58_ALPHABET = '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz';
export const ADDRESS_MIN_LENGTH = 32;
export const ADDRESS_MAX_LENGTH = 44;
export const ADDRESS_BYTE_LENGTH = 32;

// ─── Link Hosts ──────────────────────────────────────────────
export const SWAP_LINK_HOSTS = ['jup.ag'] as const;
export const EXPLORER_LINK_HOSTS = [
  'dexscreener.com',
  'birdeye.so',
  'solscan.io',
  'pump.fun',
  'photon-sol.tinyastro.io',
  'gmgn.ai',
  'raydium.io',
] as const;
export const EXPLORER_QUERY_KEYS = ['token', 'mint', 'address', 'outputCurrency'] as const;

// ─── API Endpoints ───────────────────────────────────────────
export const JUPITER_SWAP_API = 'https://lite-api.jup.ag/swap/v1';
export const DEXSCREENER_API = 'https://api.dexscreener.com/latest/dex';
export const GOPLUS_API = 'https://api.gopluslabs.io/api/v1';

// ─── Trading Defaults ────────────────────────────────────────
export const LAMPORTS_PER_SOL = 1_000_000_000;
export const DEFAULT_SLIPPAGE_BPS = 500; // 5%
export const DEFAULT_PRIORITY_FEE_LAMPORTS = 100_000; // 0.0001 SOL
export const DEFAULT_FEE_RESERVE_SOL = 0.02;
export const PROCESSED_CACHE_LIMIT = 10_000;

export function solToLamports(sol: number): number {
  return Math.round(sol * LAMPORTS_PER_SOL);
}

export function lamportsToSol(lamports: number): number {
  return lamports / LAMPORTS_PER_SOL;
}
