/**
 * Block and follow-check outcomes for literal GitHub response bodies, fed
 * through the Octokit transport with a stubbed fetch.
 */

import { describe, it, expect, vi } from 'vitest';
import { createOctokitTransport } from '../client/octokit-transport.js';
import { GitHubApiError, TransportError } from '../client/errors.js';
import { blockUser, checkFollow, type BlockStatus } from '../blocks/block-status.js';

const BASE = 'https://api.github.example';
const DOCS = 'https://docs.github.com/rest/users/blocking#block-a-user';

type Reply = () => Response;

function json(status: number, body: string): Reply {
  return () => new Response(body, { status, headers: { 'content-type': 'application/json; charset=utf-8' } });
}

const noContent: Reply = () => new Response(null, { status: 204 });

function transportReplying(reply: Reply) {
  const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>): Promise<Response> => reply());
  return { transport: createOctokitTransport({ token: 'test-token', baseUrl: BASE, fetch: fetchMock }), fetchMock };
}

const ALREADY_BLOCKED = `{"message":"Blocked user has already been blocked","documentation_url":"${DOCS}"}`;
const NOT_FOUND = `{"message":"Not Found","documentation_url":"${DOCS}"}`;
const FORBIDDEN = `{"message":"Must have admin rights to Repository.","documentation_url":"${DOCS}"}`;
const VALIDATION_FAILED =
  `{"message":"Validation Failed","errors":[{"resource":"Block","code":"custom","field":"login","message":"cannot block yourself"}],"documentation_url":"${DOCS}"}`;

describe('blockUser against literal responses', () => {
  const outcomes: Array<[string, Reply, BlockStatus]> = [
    ['204 No Content', noContent, { kind: 'newly-blocked' }],
    ['422 already blocked', json(422, ALREADY_BLOCKED), { kind: 'already-blocked' }],
    ['404 Not Found', json(404, NOT_FOUND), { kind: 'user-not-found' }],
    ['403 with another message', json(403, FORBIDDEN), { kind: 'other-non-success', message: 'Must have admin rights to Repository.' }],
  ];

  it.each(outcomes)('classifies %s', async (_name, reply, expected) => {
    const { transport, fetchMock } = transportReplying(reply);

    await expect(blockUser(transport, 'spammer')).resolves.toEqual(expected);
    expect(String(fetchMock.mock.calls[0][0])).toBe(`${BASE}/user/blocks/spammer`);
    expect(fetchMock.mock.calls[0][1]?.method).toBe('PUT');
  });

  it('reports a 200 as an unknown success', async () => {
    const { transport } = transportReplying(json(200, '{}'));

    await expect(blockUser(transport, 'spammer', 'acme')).resolves.toEqual({ kind: 'other-success', status: 200 });
  });

  it('rethrows a 422 that carries field errors', async () => {
    const { transport } = transportReplying(json(422, VALIDATION_FAILED));

    const error = await blockUser(transport, 'me').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(GitHubApiError);
    expect(error).toMatchObject({
      status: 422,
      message: 'Validation Failed',
      errors: [{ resource: 'Block', code: 'custom', field: 'login', message: 'cannot block yourself' }],
    });
  });

  it('rethrows an error page without a JSON body', async () => {
    const { transport } = transportReplying(
      () => new Response('<html>Unicorn!</html>', { status: 503, headers: { 'content-type': 'text/html' } }),
    );

    const error = await blockUser(transport, 'spammer').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toMatchObject({ status: 503 });
  });
});

describe('checkFollow against literal responses', () => {
  it('is true on 204', async () => {
    const { transport, fetchMock } = transportReplying(noContent);

    await expect(checkFollow(transport, 'alice', 'bob')).resolves.toBe(true);
    expect(String(fetchMock.mock.calls[0][0])).toBe(`${BASE}/users/alice/following/bob`);
  });

  it('is false on a plain 404', async () => {
    const { transport } = transportReplying(json(404, NOT_FOUND));

    await expect(checkFollow(transport, 'alice', 'bob')).resolves.toBe(false);
  });

  it('rethrows a 422 with field errors', async () => {
    const { transport } = transportReplying(json(422, VALIDATION_FAILED));

    await expect(checkFollow(transport, 'alice', 'bob')).rejects.toBeInstanceOf(GitHubApiError);
  });
});
