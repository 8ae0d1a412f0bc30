import { PublicKey, type Connection } from '@solana/web3.js';
import { TOKEN_PROGRAM } from '../config/constants.js';
import { createModuleLogger, short } from '../utils/logger.js';

const log = createModuleLogger('holder-analyzer');

const TOKEN_ACCOUNT_SIZE = 165;

/**
 * Number of token accounts for the mint. Counts every account, including
 * empty ones, so it is an upper bound on holders.
 */
export async function countHolders(conn: Connection, mint: string): Promise<number> {
  const accounts = await conn.getProgramAccounts(new PublicKey(TOKEN_PROGRAM), {
    filters: [
      { dataSize: TOKEN_ACCOUNT_SIZE },
      { memcmp: { offset: 0, bytes: mint } },
    ],
    dataSlice: { offset: 0, length: 0 }, // count only
  });
  log.debug('Holder count', { mint: short(mint), holders: accounts.length });
  return accounts.length;
}
