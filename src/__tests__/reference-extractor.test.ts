import { describe, it, expect } from 'vitest';
import { extract, extractAll } from '../signals/reference-extractor.js';
import { isCanonicalAddress, isTradeTarget } from '../signals/address.js';
import { USDC_MINT, WSOL_MINT } from '../config/constants.js';

const JUP = 'JUPyiwrYJFskUPiHa7hkeR8VUtAeFoSYbKedZNsDvCN';
const BONK = 'DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263';
const RAY = '675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSUt1Mp8';

describe('address shape', () => {
  it('accepts 32-byte base58 keys', () => {
    expect(isCanonicalAddress(JUP)).toBe(true);
    expect(isCanonicalAddress(WSOL_MINT)).toBe(true);
  });

  it('rejects truncated keys and disallowed characters', () => {
    expect(isCanonicalAddress(JUP.slice(0, 40))).toBe(false);
    expect(isCanonicalAddress(JUP.slice(0, 42) + '0')).toBe(false);
    expect(isCanonicalAddress('hello')).toBe(false);
  });

  it('never treats base assets as trade targets', () => {
    expect(isTradeTarget(WSOL_MINT)).toBe(false);
    expect(isTradeTarget(USDC_MINT)).toBe(false);
    expect(isTradeTarget(BONK)).toBe(true);
  });
});

describe('Reference Extractor', () => {
  it('finds a bare address in chat text', () => {
    expect(extractAll(`gem found: ${JUP} 🚀`)).toEqual([
      { rawText: JUP, identifier: JUP, sourceFormat: 'bare' },
    ]);
  });

  it('emits each identifier once, at its first appearance', () => {
    const found = extractAll(`${BONK} then ${JUP} and again ${BONK} (${JUP})`);
    expect(found.map(c => c.identifier)).toEqual([BONK, JUP]);
    expect(found[0].rawText).toBe(BONK);
  });

  it('returns nothing for text holding only the native wrapper', () => {
    expect(extractAll(`buy ${WSOL_MINT} now`)).toEqual([]);
    expect(extractAll('SOL SOL SOL')).toEqual([]);
  });

  it('drops malformed and truncated addresses silently', () => {
    expect(extractAll(`CA ${JUP.slice(0, 40)} and ${JUP.slice(0, 42)}0`)).toEqual([]);
  });

  it('reads hyphen-delimited swap links', () => {
    const link = `https://jup.ag/swap/SOL-${BONK}`;
    expect(extractAll(`aping ${link}`)).toEqual([
      { rawText: link, identifier: BONK, sourceFormat: 'swap-link' },
    ]);
  });

  it('reads slash-delimited swap links without a scheme', () => {
    const found = extractAll(`jup.ag/swap/${WSOL_MINT}/${BONK}`);
    expect(found.map(c => [c.identifier, c.sourceFormat])).toEqual([[BONK, 'swap-link']]);
  });

  it('reads outputMint from swap query strings', () => {
    const found = extractAll(`https://jup.ag/swap?inputMint=${WSOL_MINT}&outputMint=${BONK}`);
    expect(found.map(c => c.identifier)).toEqual([BONK]);
  });

  it('ignores swap links that sell the token', () => {
    expect(extractAll(`https://jup.ag/swap/${BONK}-SOL`)).toEqual([]);
  });

  it('reads explorer links by path segment and query key', () => {
    const found = extractAll(
      `chart https://dexscreener.com/solana/${RAY} and https://birdeye.so/token?address=${BONK}`,
    );
    expect(found.map(c => [c.identifier, c.sourceFormat])).toEqual([
      [RAY, 'explorer-link'],
      [BONK, 'explorer-link'],
    ]);
  });

  it('strips punctuation and label prefixes', () => {
    const found = extractAll(`CA:${BONK} "${JUP}".`);
    expect(found).toEqual([
      { rawText: `CA:${BONK}`, identifier: BONK, sourceFormat: 'free-text' },
      { rawText: `"${JUP}".`, identifier: JUP, sourceFormat: 'free-text' },
    ]);
  });

  it('yields lazily', () => {
    const it = extract(`${BONK} ${JUP}`);
    expect(it.next().value).toEqual({ rawText: BONK, identifier: BONK, sourceFormat: 'bare' });
    expect(it.next().value).toEqual({ rawText: JUP, identifier: JUP, sourceFormat: 'bare' });
    expect(it.next().done).toBe(true);
  });
});
