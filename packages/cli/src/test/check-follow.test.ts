import { describe, it, expect } from 'vitest';
import { GitHubApiError } from '@octoblock/core';
import { createHarness, ok } from './harness.js';

describe('check-follow', () => {
  it('prints true when the follower follows the user', async () => {
    const harness = createHarness({
      routes: { '/users/alice/following/bob': () => ({ status: 204, data: undefined }) },
    });

    await harness.run(['check-follow', '-f', 'alice', '-u', 'bob']);

    expect(harness.stdout()).toBe('true\n');
  });

  it('defaults the user to the authenticated account', async () => {
    const harness = createHarness({
      routes: {
        '/user': ok({ login: 'me', id: 1 }),
        '/users/alice/following/me': () => {
          throw new GitHubApiError({ status: 404, message: 'Not Found' });
        },
      },
    });

    await harness.run(['check-follow', '--follower', 'alice']);

    expect(harness.stdout()).toBe('false\n');
  });

  it('fails without a user when not authenticated', async () => {
    const refusal = new GitHubApiError({ status: 401, message: 'Requires authentication' });
    const harness = createHarness({
      routes: {
        '/user': () => {
          throw refusal;
        },
      },
    });

    await expect(harness.run(['check-follow', '-f', 'alice'])).rejects.toBe(refusal);
    expect(harness.stdout()).toBe('');
  });
});
