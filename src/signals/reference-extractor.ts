import { EXPLORER_LINK_HOSTS, EXPLORER_QUERY_KEYS, SWAP_LINK_HOSTS, WSOL_MINT } from '../config/constants.js';
import { isNativeWrapper, isTradeTarget } from './address.js';
import type { ResolvedCandidate, SourceFormat } from '../types/index.js';

interface TokenMatch {
  identifier: string;
  format: SourceFormat;
}

const LEADING_PUNCTUATION = /^["'`(<[{*]+/;
const TRAILING_PUNCTUATION = /["'`)>\]},.;:!?*]+$/;

function stripPunctuation(token: string): string {
  return token.replace(LEADING_PUNCTUATION, '').replace(TRAILING_PUNCTUATION, '');
}

function hostMatches(hostname: string, hosts: readonly string[]): boolean {
  return hosts.some(h => hostname === h || hostname.endsWith(`.${h}`));
}

function mentionsHost(token: string, hosts: readonly string[]): boolean {
  const lower = token.toLowerCase();
  return hosts.some(h => lower.includes(`${h}/`) || lower.includes(`${h}?`));
}

function parseLink(token: string): URL | null {
  const withScheme = /^https?:\/\//i.test(token) ? token : `https://${token}`;
  try {
    return new URL(withScheme);
  } catch {
    return null;
  }
}

function pathSegments(url: URL): string[] {
  return url.pathname.split('/').filter(Boolean).map(s => {
    try {
      return decodeURIComponent(s);
    } catch {
      return s;
    }
  });
}

/**
 * jup.ag/swap/<wrapper>-<mint>, jup.ag/swap/<wrapper>/<mint> and
 * jup.ag/swap?inputMint=<wrapper>&outputMint=<mint>.
 * Links whose input side is not the native wrapper are sells and carry no signal.
 */
function matchSwapLink(url: URL): string | null {
  const segments = pathSegments(url);
  const swapAt = segments.findIndex(s => s.toLowerCase() === 'swap');
  if (swapAt >= 0) {
    const rest = segments.slice(swapAt + 1);
    const pair = rest[0]?.includes('-') ? rest[0].split('-') : rest.slice(0, 2);
    if (pair.length === 2 && isNativeWrapper(pair[0]) && isTradeTarget(pair[1])) {
      return pair[1];
    }
  }

  const output = url.searchParams.get('outputMint');
  const input = url.searchParams.get('inputMint') ?? WSOL_MINT;
  if (output && isNativeWrapper(input) && isTradeTarget(output)) {
    return output;
  }
  return null;
}

function matchExplorerLink(url: URL): string | null {
  const fromPath = pathSegments(url).find(isTradeTarget);
  if (fromPath) return fromPath;

  for (const key of EXPLORER_QUERY_KEYS) {
    const value = url.searchParams.get(key);
    if (value && isTradeTarget(value)) return value;
  }
  return null;
}

/**
 * A whitespace-delimited token standing alone, optionally wrapped in quotes or
 * brackets or prefixed with a `label:` / `label=` tag (e.g. `CA:<mint>`).
 */
function matchBareToken(token: string): TokenMatch | null {
  let cleaned = stripPunctuation(token);
  let format: SourceFormat = cleaned === token ? 'bare' : 'free-text';

  const labelEnd = Math.max(cleaned.lastIndexOf(':'), cleaned.lastIndexOf('='));
  if (labelEnd >= 0) {
    cleaned = cleaned.slice(labelEnd + 1);
    format = 'free-text';
  }

  return isTradeTarget(cleaned) ? { identifier: cleaned, format } : null;
}

/** Applies the rules in priority order; the first rule that claims a token wins it. */
function matchToken(token: string): TokenMatch | null {
  const stripped = stripPunctuation(token);

  if (mentionsHost(stripped, SWAP_LINK_HOSTS)) {
    const url = parseLink(stripped);
    if (url && hostMatches(url.hostname, SWAP_LINK_HOSTS)) {
      const identifier = matchSwapLink(url);
      return identifier ? { identifier, format: 'swap-link' } : null;
    }
  }

  if (mentionsHost(stripped, EXPLORER_LINK_HOSTS)) {
    const url = parseLink(stripped);
    if (url && hostMatches(url.hostname, EXPLORER_LINK_HOSTS)) {
      const identifier = matchExplorerLink(url);
      return identifier ? { identifier, format: 'explorer-link' } : null;
    }
  }

  return matchBareToken(token);
}

/**
 * Lazily yields the contract candidates in `text`, in order of first
 * appearance, once per identifier. Malformed or truncated addresses and the
 * base assets are dropped silently: no candidates simply means no signal.
 */
export function* extract(text: string): Generator<ResolvedCandidate, void, undefined> {
  const seen = new Set<string>();
  for (const m of text.matchAll(/\S+/g)) {
    const token = m[0];
    const found = matchToken(token);
    if (!found || seen.has(found.identifier)) continue;
    seen.add(found.identifier);
    yield { rawText: token, identifier: found.identifier, sourceFormat: found.format };
  }
}

export function extractAll(text: string): ResolvedCandidate[] {
  return Array.from(extract(text));
}
