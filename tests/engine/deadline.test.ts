import { ProvisioningError } from '../../src/domain/errors';
import { Deadline } from '../../src/engine/deadline';

describe('Deadline', () => {
  test('an unbounded deadline never expires', async () => {
    const deadline = new Deadline();
    expect(deadline.remainingMs()).toBeUndefined();
    expect(() => deadline.check()).not.toThrow();
    await expect(deadline.race(async () => 'done')).resolves.toBe('done');
  });

  test('tracks the remaining budget against the clock', () => {
    let clock = 1_000;
    const deadline = new Deadline(500, () => clock);
    expect(deadline.remainingMs()).toBe(500);
    clock = 1_400;
    expect(deadline.remainingMs()).toBe(100);
    expect(() => deadline.check('ensure_group')).not.toThrow();
  });

  test('check throws once the budget is spent', () => {
    let clock = 0;
    const deadline = new Deadline(200, () => clock);
    clock = 200;
    let caught: unknown;
    try {
      deadline.check('ensure_folder');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ProvisioningError);
    if (caught instanceof ProvisioningError) {
      expect(caught.typedError).toMatchObject({
        code: 'PROVISIONING.DEADLINE_EXCEEDED',
        stage: 'ensure_folder',
        details: { deadlineMs: 200 },
      });
    }
  });

  test('race rejects when work outlives the budget', async () => {
    const deadline = new Deadline(20);
    const slow = () => new Promise<string>((resolve) => setTimeout(() => resolve('late'), 100));
    await expect(deadline.race(slow, 'clone_dashboards')).rejects.toMatchObject({
      typedError: { code: 'PROVISIONING.DEADLINE_EXCEEDED', stage: 'clone_dashboards' },
    });
  });

  test('race resolves with work that finishes in time', async () => {
    const deadline = new Deadline(1_000);
    await expect(deadline.race(async () => 42)).resolves.toBe(42);
  });

  test('race passes work errors through', async () => {
    const deadline = new Deadline(1_000);
    await expect(
      deadline.race(async () => {
        throw new Error('remote down');
      }),
    ).rejects.toThrow('remote down');
  });
});
