import type { INestApplication } from '@nestjs/common';
import { createTestApp } from './helpers/app.helper';
import { accountStore, resetDatabase } from './helpers/db.helper';
import { apiGet, apiPost } from './helpers/request.helper';
import { resetFixtureCounter, signupAs, validSignup } from './helpers/fixtures';

describe('Signup & provisioning (E2E)', () => {
  let app: INestApplication;

  const emptyStats = { users: 0, profiles: 0, balances: 0, ledgerEntries: 0, notifications: 0 };

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(() => {
    resetDatabase(app);
    resetFixtureCounter();
  });

  describe('POST /api/auth/signup', () => {
    it('provisions alice_01 end to end', async () => {
      const res = await apiPost(app, '/api/auth/signup', {
        email: 'alice@example.test',
        metadata: { username: 'alice_01' },
      }).expect(201);

      const userId: string = res.body.user.id;
      expect(res.body.user.email).toBe('alice@example.test');
      expect(res.body.profile).toMatchObject({
        id: userId,
        username: 'alice_01',
        avatarUrl: 'https://ui-avatars.com/api/?name=alice_01&background=random',
      });
      expect(res.body.balance).toMatchObject({ userId, balance: 5 });
      expect(res.body.expiresIn).toBe(3600);
      expect(typeof res.body.accessToken).toBe('string');

      const token: string = res.body.accessToken;

      const balance = await apiGet(app, '/api/me/balance', token).expect(200);
      expect(balance.body).toMatchObject({ userId, balance: 5 });

      const transactions = await apiGet(app, '/api/me/transactions', token).expect(200);
      expect(transactions.body).toHaveLength(1);
      expect(transactions.body[0]).toMatchObject({
        userId,
        amount: 5,
        type: 'welcome_bonus',
        description: 'Welcome bonus for new user',
      });

      const notifications = await apiGet(app, '/api/me/notifications', token).expect(200);
      expect(notifications.body).toHaveLength(1);
      expect(notifications.body[0]).toMatchObject({
        userId,
        title: 'Welcome to Roomcast!',
        message: "Thanks for joining! You've received 5 credits as a welcome bonus.",
        type: 'welcome_bonus',
        read: false,
      });

      expect(accountStore(app).stats()).toEqual({
        users: 1,
        profiles: 1,
        balances: 1,
        ledgerEntries: 1,
        notifications: 1,
      });
    });

    it('uses a supplied avatar_url verbatim', async () => {
      const res = await apiPost(
        app,
        '/api/auth/signup',
        signupAs('bob-2', { avatar_url: 'https://cdn.example.test/bob.png' }),
      ).expect(201);

      expect(res.body.profile.avatarUrl).toBe('https://cdn.example.test/bob.png');
    });

    it('propagates X-Request-Id', async () => {
      const res = await apiPost(app, '/api/auth/signup', validSignup())
        .set('X-Request-Id', 'e2e-req-1')
        .expect(201);

      expect(res.headers['x-request-id']).toBe('e2e-req-1');
    });

    it.each(['ab', 'this_username_is_22chars!', 'has space'])(
      'rejects username %p with 400 and writes nothing',
      async (username) => {
        const res = await apiPost(app, '/api/auth/signup', signupAs(username)).expect(400);

        expect(res.body).toEqual({ status: '400', code: 'invalidValue', detail: 'invalid username format' });
        expect(accountStore(app).stats()).toEqual(emptyStats);
      },
    );

    it('rejects a missing username', async () => {
      const res = await apiPost(app, '/api/auth/signup', { metadata: {} }).expect(400);
      expect(res.body).toEqual({ status: '400', code: 'invalidValue', detail: 'username required' });
    });

    it('rejects a body without metadata', async () => {
      const res = await apiPost(app, '/api/auth/signup', { email: 'x@example.test' }).expect(400);
      expect(res.body).toEqual({ status: '400', code: 'invalidValue', detail: 'metadata must be an object' });
    });

    it('rejects a malformed email', async () => {
      const res = await apiPost(app, '/api/auth/signup', validSignup({ email: 'not-an-email' })).expect(400);
      expect(res.body.code).toBe('invalidValue');
    });

    it('rejects a case-insensitive username duplicate with 409', async () => {
      await apiPost(app, '/api/auth/signup', signupAs('Carol')).expect(201);

      for (let i = 0; i < 2; i++) {
        const res = await apiPost(app, '/api/auth/signup', signupAs('carol')).expect(409);
        expect(res.body).toEqual({ status: '409', code: 'uniqueness', detail: 'username already exists' });
      }
      expect(accountStore(app).stats().users).toBe(1);
    });

    it('rejects a duplicate email with 409', async () => {
      await apiPost(app, '/api/auth/signup', { email: 'dave@example.test', metadata: { username: 'dave' } }).expect(201);

      const res = await apiPost(app, '/api/auth/signup', {
        email: 'dave@example.test',
        metadata: { username: 'dave_2' },
      }).expect(409);
      expect(res.body).toEqual({ status: '409', code: 'uniqueness', detail: 'email already registered' });
    });

    it('lets exactly one of two concurrent same-username signups through', async () => {
      const [a, b] = await Promise.all([
        apiPost(app, '/api/auth/signup', signupAs('erin')),
        apiPost(app, '/api/auth/signup', signupAs('erin')),
      ]);

      const statuses = [a.status, b.status].sort();
      expect(statuses[0]).toBe(201);
      expect([409, 503]).toContain(statuses[1]);
      expect(accountStore(app).stats()).toEqual({
        users: 1,
        profiles: 1,
        balances: 1,
        ledgerEntries: 1,
        notifications: 1,
      });
    });
  });
});
