import { describe, it, expect, vi } from 'vitest';
import type { Connection, SignatureStatus } from '@solana/web3.js';
import { mapRpcStatus, settleSignature } from '../execution/tx-confirmation.js';

function statuses(status: SignatureStatus | null) {
  return { context: { slot: 1 }, value: [status] };
}

function fakeClock() {
  const clock = { t: 0, waits: [] as number[] };
  return {
    clock,
    now: () => clock.t,
    wait: async (ms: number) => { clock.waits.push(ms); clock.t += ms; },
  };
}

function chain(heights: number[] = [50]) {
  const getSignatureStatuses = vi.fn<Connection['getSignatureStatuses']>().mockResolvedValue(statuses(null));
  const getBlockHeight = vi.fn<Connection['getBlockHeight']>();
  for (const h of heights.slice(0, -1)) getBlockHeight.mockResolvedValueOnce(h);
  getBlockHeight.mockResolvedValue(heights[heights.length - 1] ?? 50);
  return { getSignatureStatuses, getBlockHeight };
}

const CONFIRMED: SignatureStatus = { slot: 7, confirmations: 2, err: null, confirmationStatus: 'confirmed' };

describe('mapRpcStatus', () => {
  it('maps the RPC status to a settlement state', () => {
    expect(mapRpcStatus(null)).toEqual({ state: 'settling' });
    expect(mapRpcStatus({ slot: 5, confirmations: 0, err: null, confirmationStatus: 'processed' }))
      .toEqual({ state: 'settling', confirmationStatus: 'processed', slot: 5 });
    expect(mapRpcStatus({ slot: 5, confirmations: null, err: null, confirmationStatus: 'finalized' }))
      .toEqual({ state: 'confirmed', confirmationStatus: 'finalized', slot: 5 });
    expect(mapRpcStatus({ slot: 5, confirmations: null, err: { InstructionError: [0, { Custom: 1 }] }, confirmationStatus: 'confirmed' }))
      .toEqual({ state: 'failed', error: '{"InstructionError":[0,{"Custom":1}]}', confirmationStatus: 'confirmed', slot: 5 });
  });
});

describe('settleSignature', () => {
  it('polls until the signature confirms', async () => {
    const rpc = chain();
    rpc.getSignatureStatuses
      .mockResolvedValueOnce(statuses(null))
      .mockResolvedValueOnce(statuses({ slot: 7, confirmations: 1, err: null, confirmationStatus: 'processed' }))
      .mockResolvedValue(statuses(CONFIRMED));
    const { clock, now, wait } = fakeClock();

    const result = await settleSignature(rpc, 'sig-1', 100, { pollMs: 300, wait, now });

    expect(result).toEqual({ state: 'confirmed', confirmationStatus: 'confirmed', slot: 7 });
    expect(clock.waits).toEqual([300, 300]);
    expect(rpc.getSignatureStatuses).toHaveBeenCalledWith(['sig-1'], { searchTransactionHistory: true });
  });

  it('returns a failed status as soon as it appears', async () => {
    const rpc = chain();
    rpc.getSignatureStatuses.mockResolvedValue(
      statuses({ slot: 9, confirmations: null, err: 'BlockhashNotFound', confirmationStatus: 'processed' }),
    );
    const { now, wait } = fakeClock();

    expect(await settleSignature(rpc, 'sig-2', 100, { wait, now }))
      .toMatchObject({ state: 'failed', error: 'BlockhashNotFound' });
    expect(rpc.getBlockHeight).not.toHaveBeenCalled();
  });

  it('reports expiry once the block height passes the blockhash', async () => {
    const rpc = chain([99, 101]);
    const { clock, now, wait } = fakeClock();

    const result = await settleSignature(rpc, 'sig-3', 100, { pollMs: 250, wait, now });

    expect(result).toEqual({ state: 'expired', error: 'Blockhash expired at height 101 (valid through 100)' });
    expect(clock.waits).toEqual([250]);
    expect(rpc.getSignatureStatuses).toHaveBeenCalledTimes(3);
  });

  it('rechecks the signature before calling it expired', async () => {
    const rpc = chain([101]);
    rpc.getSignatureStatuses.mockResolvedValueOnce(statuses(null)).mockResolvedValue(statuses(CONFIRMED));
    const { now, wait } = fakeClock();

    expect(await settleSignature(rpc, 'sig-4', 100, { wait, now })).toMatchObject({ state: 'confirmed', slot: 7 });
  });

  it('gives up as unresolved while the blockhash is still live', async () => {
    const rpc = chain([50]);
    const { clock, now, wait } = fakeClock();

    const result = await settleSignature(rpc, 'sig-5', 100, { maxWaitMs: 1000, pollMs: 250, wait, now });

    expect(result).toEqual({ state: 'unresolved', error: 'No final signature status within 1000ms' });
    expect(clock.waits).toEqual([250, 250, 250, 250]);
    expect(rpc.getSignatureStatuses).toHaveBeenCalledTimes(5);
  });

  it('clamps the wait bound and poll interval', async () => {
    const rpc = chain([50]);
    const { clock, now, wait } = fakeClock();

    const result = await settleSignature(rpc, 'sig-6', 100, { maxWaitMs: 10, pollMs: 1, wait, now });

    expect(result.error).toBe('No final signature status within 1000ms');
    expect(clock.waits).toEqual([250, 250, 250, 250]);
  });

  it('keeps polling through RPC read errors', async () => {
    const rpc = chain();
    rpc.getSignatureStatuses.mockRejectedValueOnce(new Error('503')).mockResolvedValue(statuses(CONFIRMED));
    rpc.getBlockHeight.mockRejectedValueOnce(new Error('503'));
    const { clock, now, wait } = fakeClock();

    expect(await settleSignature(rpc, 'sig-7', 100, { wait, now })).toMatchObject({ state: 'confirmed' });
    expect(clock.waits).toEqual([1000]);
  });
});
