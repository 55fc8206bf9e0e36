import { describe, expect, it } from 'vitest';

import { ChallengeClient } from '../../src/challenge/challenge-client.js';
import { PipelineError } from '../../src/core/errors.js';
import { createFakeFetch, createMemoryLogger } from '../helpers/fakes.js';

const BASE_URL = 'https://challenge.test';

const json = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });

const captureError = async (promise: Promise<unknown>): Promise<PipelineError> => {
  try {
    await promise;
  } catch (error) {
    if (error instanceof PipelineError) return error;
    throw error;
  }
  throw new Error('expected a PipelineError');
};

describe('ChallengeClient.fetchDump', () => {
  it('returns the dump field unchanged on HTTP 200', async () => {
    const { fetch, calls } = createFakeFetch([json({ dump: 'H4sIAAAA+/==' })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    await expect(client.fetchDump('abc123')).resolves.toBe('H4sIAAAA+/==');
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://challenge.test/challenges/backup_restore/problem?access_token=abc123');
    expect(calls[0].init).toBeUndefined();
  });

  it('fails with the response body on HTTP 500', async () => {
    const { fetch } = createFakeFetch([new Response('upstream exploded', { status: 500 })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.fetchDump('abc123'));
    expect(error.code).toBe('FETCH_FAILED');
    expect(error.message).toBe(
      'Failed to get PostgreSQL dump from https://challenge.test/challenges/backup_restore/problem?access_token=abc123 (HTTP 500)'
    );
    expect(error.detail).toBe('upstream exploded');
  });

  it('treats any status other than 200 as a failure', async () => {
    const { fetch } = createFakeFetch([json({ dump: 'x' }, 203)]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.fetchDump('abc123'));
    expect(error.code).toBe('FETCH_FAILED');
    expect(error.message).toBe(
      'Failed to get PostgreSQL dump from https://challenge.test/challenges/backup_restore/problem?access_token=abc123 (HTTP 203)'
    );
  });

  it('fails when the body is not JSON', async () => {
    const { fetch } = createFakeFetch([new Response('<html>', { status: 200 })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.fetchDump('abc123'));
    expect(error.code).toBe('FETCH_FAILED');
    expect(error.detail).toBe('<html>');
  });

  it('fails when the JSON has no string dump field', async () => {
    const { fetch } = createFakeFetch([json({ dump: 42 })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.fetchDump('abc123'));
    expect(error.code).toBe('FETCH_FAILED');
    expect(error.message).toBe(
      'Response from https://challenge.test/challenges/backup_restore/problem?access_token=abc123 has no "dump" field'
    );
  });

  it('wraps network failures', async () => {
    const { fetch } = createFakeFetch([new Error('ECONNREFUSED')]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.fetchDump('abc123'));
    expect(error.code).toBe('FETCH_FAILED');
    expect(error.cause).toBeInstanceOf(Error);
  });

  it('encodes the token in the query string', () => {
    const client = new ChallengeClient({ baseUrl: `${BASE_URL}/` });
    expect(client.problemUrl('a b&c')).toBe(
      'https://challenge.test/challenges/backup_restore/problem?access_token=a+b%26c'
    );
  });

  it('logs the request at info level', async () => {
    const { fetch } = createFakeFetch([json({ dump: 'x' })]);
    const { logger, entries } = createMemoryLogger('info');
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch, logger });

    await client.fetchDump('abc123');
    expect(entries).toEqual([
      {
        level: 'info',
        message: 'Getting PostgreSQL dump from https://challenge.test/challenges/backup_restore/problem?access_token=abc123',
      },
    ]);
  });
});

describe('ChallengeClient.submitSolution', () => {
  it('posts the payload as JSON and returns the response text verbatim', async () => {
    const { fetch, calls } = createFakeFetch([new Response('{"result": "passed"}', { status: 200 })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    await expect(client.submitSolution('abc123', { alive_ssns: ['123-45-6789'] })).resolves.toBe('{"result": "passed"}');

    expect(calls[0].url).toBe('https://challenge.test/challenges/backup_restore/solve?access_token=abc123&playground=1');
    expect(calls[0].init?.method).toBe('POST');
    expect(calls[0].init?.body).toBe('{"alive_ssns":["123-45-6789"]}');
    expect(calls[0].init?.headers).toEqual({ 'Content-Type': 'application/json' });
  });

  it('fails with SUBMIT_FAILED on HTTP 403', async () => {
    const { fetch } = createFakeFetch([new Response('bad token', { status: 403 })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.submitSolution('abc123', { alive_ssns: ['123-45-6789'] }));
    expect(error.code).toBe('SUBMIT_FAILED');
    expect(error.message).toBe(
      'Failed to submit solution to https://challenge.test/challenges/backup_restore/solve?access_token=abc123&playground=1 (HTTP 403)'
    );
    expect(error.detail).toBe('bad token');
  });

  it('fails with SUBMIT_FAILED on HTTP 204', async () => {
    const { fetch } = createFakeFetch([new Response(null, { status: 204 })]);
    const client = new ChallengeClient({ baseUrl: BASE_URL, fetch });

    const error = await captureError(client.submitSolution('abc123', { alive_ssns: [] }));
    expect(error.code).toBe('SUBMIT_FAILED');
    expect(error.message).toBe(
      'Failed to submit solution to https://challenge.test/challenges/backup_restore/solve?access_token=abc123&playground=1 (HTTP 204)'
    );
    expect(error.detail).toBe('');
  });

  it('leaves out the playground flag when disabled', () => {
    const client = new ChallengeClient({ baseUrl: BASE_URL, playground: false });
    expect(client.solveUrl('abc123')).toBe('https://challenge.test/challenges/backup_restore/solve?access_token=abc123');
  });
});
