import { beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AguaIotApi } from '../src/api/AguaIotApi';
import { SessionManager } from '../src/api/SessionManager';
import { resolveOptions } from '../src/config';
import { AuthenticationError, NetworkError, ServiceError } from '../src/errors';
import {
  FakeAguaIot,
  TEST_CLIENT_TOKEN,
  TEST_EMAIL,
  TEST_PASSWORD,
  TOKEN_LIFETIME_SECONDS,
  fakeOptions,
  networkFailure,
  recordingLogger,
} from './support/fakeAguaIot';
import type { LogLine } from './support/fakeAguaIot';

describe('SessionManager', () => {
  let fake: FakeAguaIot;
  let sessionManager: SessionManager;

  beforeEach(() => {
    fake = new FakeAguaIot();
    const options = resolveOptions(fakeOptions(fake));
    sessionManager = new SessionManager(new AguaIotApi(options), options);
  });

  describe('authenticate', () => {
    it('registers the client token, then logs in', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);

      assert.deepEqual(fake.requests.map((request) => request.path), ['/appSignup', '/userLogin']);
      assert.equal(fake.requests[0].body.phone_id, TEST_CLIENT_TOKEN);
      assert.equal(fake.requests[1].authorization, TEST_CLIENT_TOKEN);
      assert.equal(typeof session.token, 'string');
      assert.equal(session.refreshToken, 'refresh-1');
      assert.equal(session.expiresAt, fake.now + TOKEN_LIFETIME_SECONDS * 1000);
      assert.equal(session.isValid(fake.now), true);
    });

    it('fails with AuthenticationError on wrong credentials', async () => {
      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, 'wrong-password', TEST_CLIENT_TOKEN),
        AuthenticationError,
      );
      assert.equal(fake.loginCount, 1);
    });

    it('fails with AuthenticationError when the client token is refused', async () => {
      fake.intercept((request) => (request.path === '/appSignup' ? { status: 403 } : undefined));

      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN),
        AuthenticationError,
      );
      assert.equal(fake.loginCount, 0);
    });

    it('fails with ServiceError when the platform errors', async () => {
      fake.intercept((request) => (request.path === '/userLogin' ? { status: 503, data: { message: 'down' } } : undefined));

      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN),
        (error: unknown) => error instanceof ServiceError && error.status === 503 && error.payloadShape === '{message: string}',
      );
    });

    it('fails with ServiceError when the login answer has no token', async () => {
      fake.intercept((request) => (request.path === '/userLogin' ? { status: 200, data: { user: 'x' } } : undefined));

      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN),
        ServiceError,
      );
    });

    it('fails with ServiceError when the token carries no expiry', async () => {
      fake.intercept((request) => (request.path === '/userLogin' ? { status: 200, data: { token: 'not-a-jwt' } } : undefined));

      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN),
        /Token without expiry/,
      );
    });

    it('fails with NetworkError when the platform is unreachable', async () => {
      fake.intercept((_request, config) => {
        throw networkFailure(config);
      });

      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN),
        (error: unknown) => error instanceof NetworkError && /timed out after 10000 ms/.test(error.message),
      );
    });

    it('logs the payload shape of a login answer without token', async () => {
      const lines: LogLine[] = [];
      const options = resolveOptions(fakeOptions(fake, { log: recordingLogger(lines) }));
      sessionManager = new SessionManager(new AguaIotApi(options), options);
      fake.intercept((request) => (request.path === '/userLogin' ? { status: 200, data: { jwt: 42 } } : undefined));

      await assert.rejects(
        sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN),
        (error: unknown) => error instanceof ServiceError && error.message === 'Unexpected login response',
      );
      assert.deepEqual(lines.filter((line) => line.level === 'error'), [{
        level: 'error',
        message: '[SessionManager] Unexpected login response, payload:',
        parameters: ['{jwt: number}'],
      }]);
    });
  });

  describe('ensureValid', () => {
    it('returns a valid session without any request', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);
      const before = fake.requests.length;

      assert.equal(await sessionManager.ensureValid(session), session);
      assert.equal(fake.requests.length, before);
    });

    it('refreshes a token about to expire', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);
      const oldToken = session.token;
      fake.now += (TOKEN_LIFETIME_SECONDS - 60) * 1000;

      await sessionManager.ensureValid(session);

      assert.equal(fake.refreshCount, 1);
      assert.equal(fake.loginCount, 1);
      assert.notEqual(session.token, oldToken);
      assert.equal(session.refreshToken, 'refresh-1');
      assert.equal(session.expiresAt, fake.now + TOKEN_LIFETIME_SECONDS * 1000);
    });

    it('logs in again when the refresh token is rejected', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);
      fake.now += TOKEN_LIFETIME_SECONDS * 1000;
      fake.rejectRefresh = true;

      await sessionManager.ensureValid(session);

      assert.equal(fake.refreshCount, 1);
      assert.equal(fake.loginCount, 2);
      assert.equal(session.refreshToken, 'refresh-2');
      assert.equal(session.isValid(fake.now), true);
    });

    it('logs in again after invalidate', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);
      sessionManager.invalidate(session);
      assert.equal(session.isValid(fake.now), false);

      await sessionManager.ensureValid(session);

      assert.equal(fake.refreshCount, 0);
      assert.equal(fake.loginCount, 2);
      assert.equal(session.invalidated, false);
    });

    it('shares one re-authentication between concurrent callers', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);
      sessionManager.invalidate(session);

      await Promise.all([sessionManager.ensureValid(session), sessionManager.ensureValid(session)]);

      assert.equal(fake.loginCount, 2);
      assert.equal(session.pending, undefined);
    });

    it('fails with AuthenticationError when the password changed', async () => {
      const session = await sessionManager.authenticate(TEST_EMAIL, TEST_PASSWORD, TEST_CLIENT_TOKEN);
      sessionManager.invalidate(session);
      fake.password = 'changed-password';

      await assert.rejects(sessionManager.ensureValid(session), AuthenticationError);
      assert.equal(session.pending, undefined);
    });
  });
});
