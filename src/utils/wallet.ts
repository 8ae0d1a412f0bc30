import { Keypair, Connection, PublicKey } from '@solana/web3.js';
import bs58 from 'bs58';
import { createModuleLogger, short } from './logger.js';

const log = createModuleLogger('wallet');

const _connections = new Map<string, Connection>();

export function getConnection(rpcUrl: string): Connection {
  let conn = _connections.get(rpcUrl);
  if (!conn) {
    conn = new Connection(rpcUrl, {
      commitment: 'confirmed',
      wsEndpoint: rpcUrl.replace('https://', 'wss://'),
    });
    _connections.set(rpcUrl, conn);
    log.info('RPC connected', { url: rpcUrl.split('?')[0] });
  }
  return conn;
}

/**
 * Signing keys of the funding accounts, addressed by their base58 public key.
 * The rest of the engine only ever handles the public key as an opaque ref.
 */
export class KeyRing {
  private readonly keys = new Map<string, Keypair>();

  constructor(keypairs: Keypair[] = []) {
    for (const kp of keypairs) {
      this.keys.set(kp.publicKey.toBase58(), kp);
    }
  }

  static fromSecretKeys(secretKeys: string[]): KeyRing {
    const keypairs: Keypair[] = [];
    secretKeys.forEach((secret, i) => {
      try {
        keypairs.push(Keypair.fromSecretKey(bs58.decode(secret)));
      } catch (err) {
        log.error('Failed to load funding key', { index: i + 1, error: err instanceof Error ? err.message : String(err) });
      }
    });
    const ring = new KeyRing(keypairs);
    log.info('Funding keys loaded', { loaded: ring.size, configured: secretKeys.length });
    return ring;
  }

  get size(): number {
    return this.keys.size;
  }

  refs(): string[] {
    return Array.from(this.keys.keys());
  }

  get(accountRef: string): Keypair {
    const kp = this.keys.get(accountRef);
    if (!kp) {
      throw new Error(`No signing key for account ${short(accountRef)}`);
    }
    return kp;
  }
}

export function createBalanceFetcher(conn: Connection): (accountRef: string) => Promise<number> {
  return async (accountRef: string) => conn.getBalance(new PublicKey(accountRef));
}
