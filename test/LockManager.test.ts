import { describe, it, expect, beforeEach } from 'vitest';
import {
  RECIPIENT,
  SECURITY,
  START,
  WALLET,
  addGuardians,
  createFixture,
  guardianA,
  ownerCtx,
  selfCtx,
  stranger,
  type Fixture,
} from './utils/fixture';
import { expectCode } from './utils/expectCode';

describe('LockManager', () => {
  let fixture: Fixture;

  beforeEach(async () => {
    fixture = createFixture();
    await addGuardians(fixture, [guardianA.address]);
  });

  it('should let a guardian lock the wallet for the lock period', async () => {
    const { module } = fixture;
    const releaseAfter = await module.locks.lock({ sender: guardianA.address }, WALLET);

    expect(releaseAfter).toBe(START + SECURITY.lockPeriod);
    expect(module.locks.isLocked(WALLET)).toBe(true);
    expect(module.locks.getLock(WALLET)).toEqual({ releaseAfter, locker: 'manual' });
  });

  it('should refuse callers that are not guardians', async () => {
    await expectCode(fixture.module.locks.lock(ownerCtx, WALLET), 'NOT_GUARDIAN_OR_SELF');
    await expectCode(fixture.module.locks.lock({ sender: stranger.address }, WALLET), 'NOT_GUARDIAN_OR_SELF');
  });

  it('should not lock a locked wallet', async () => {
    const { module } = fixture;
    await module.locks.lock(selfCtx, WALLET);
    await expectCode(module.locks.lock({ sender: guardianA.address }, WALLET), 'WALLET_LOCKED');
  });

  it('should let a guardian unlock a manual lock', async () => {
    const { module } = fixture;
    await module.locks.lock({ sender: guardianA.address }, WALLET);

    await module.locks.unlock({ sender: guardianA.address }, WALLET);
    expect(module.locks.isLocked(WALLET)).toBe(false);
    await expectCode(module.locks.unlock({ sender: guardianA.address }, WALLET), 'WALLET_UNLOCKED');
  });

  it('should release the lock when it expires', async () => {
    const { module, clock } = fixture;
    await module.locks.lock({ sender: guardianA.address }, WALLET);

    clock.advance(SECURITY.lockPeriod - 1n);
    expect(module.locks.isLocked(WALLET)).toBe(true);
    clock.advance(1n);
    expect(module.locks.isLocked(WALLET)).toBe(false);
    expect(module.locks.getLock(WALLET)).toEqual({ releaseAfter: 0n, locker: null });
  });

  it('should block owner operations while locked', async () => {
    const { module } = fixture;
    await module.locks.lock({ sender: guardianA.address }, WALLET);

    await expectCode(module.transactions.addToWhitelist(ownerCtx, WALLET, RECIPIENT), 'WALLET_LOCKED');
    await expectCode(module.transactions.clearSession(ownerCtx, WALLET), 'WALLET_LOCKED');
  });
});
