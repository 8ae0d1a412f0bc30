import { PublicKey, type Connection } from '@solana/web3.js';
import { getMint } from '@solana/spl-token';
import { createModuleLogger, short } from '../utils/logger.js';

const log = createModuleLogger('mint-checker');

export interface MintAuthorities {
  mintAuthorityRevoked: boolean;
  freezeAuthorityRevoked: boolean;
}

/** Reads the mint account. RPC failures propagate to the caller. */
export async function fetchMintAuthorities(conn: Connection, mint: string): Promise<MintAuthorities> {
  const mintInfo = await getMint(conn, new PublicKey(mint));
  const result = {
    mintAuthorityRevoked: mintInfo.mintAuthority === null,
    freezeAuthorityRevoked: mintInfo.freezeAuthority === null,
  };
  log.debug('Mint check complete', {
    mint: short(mint),
    mintRevoked: result.mintAuthorityRevoked,
    freezeRevoked: result.freezeAuthorityRevoked,
  });
  return result;
}
