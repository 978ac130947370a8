import type { INestApplication } from '@nestjs/common';
import { createTestApp } from './helpers/app.helper';
import { resetDatabase } from './helpers/db.helper';
import { apiDelete, apiGet, apiPatch, apiPost } from './helpers/request.helper';
import { signUp, type SignedUpUser } from './helpers/auth.helper';
import { resetFixtureCounter, validRoom } from './helpers/fixtures';

describe('Audio rooms (E2E)', () => {
  let app: INestApplication;
  let host: SignedUpUser;
  let guest: SignedUpUser;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  beforeEach(async () => {
    resetDatabase(app);
    resetFixtureCounter();
    host = await signUp(app, 'hannah');
    guest = await signUp(app, 'gus');
  });

  const openRoom = async (title = 'Open mic'): Promise<string> => {
    const res = await apiPost(app, '/api/rooms', { title }, host.token).expect(201);
    return String(res.body.id);
  };

  describe('rooms', () => {
    it('creates a room hosted by the caller', async () => {
      const res = await apiPost(app, '/api/rooms', { title: '  Late night jazz ' }, host.token).expect(201);

      expect(res.body).toMatchObject({ title: 'Late night jazz', hostId: host.userId });
    });

    it('requires authentication to create', async () => {
      await apiPost(app, '/api/rooms', validRoom()).expect(401);
    });

    it('rejects a blank title', async () => {
      const res = await apiPost(app, '/api/rooms', { title: '   ' }, host.token).expect(400);
      expect(res.body).toEqual({
        status: '400',
        code: 'invalidValue',
        detail: 'title must be between 1 and 120 characters',
      });
    });

    it('rejects a missing title', async () => {
      const res = await apiPost(app, '/api/rooms', {}, host.token).expect(400);
      expect(res.body.detail).toBe('title must be a string');
    });

    it('lists rooms newest first without a token', async () => {
      const first = await openRoom('first');
      const second = await openRoom('second');

      const res = await apiGet(app, '/api/rooms').expect(200);
      expect(res.body.map((r: { id: string }) => r.id)).toEqual([second, first]);
    });

    it('lets only the host rename and delete', async () => {
      const roomId = await openRoom();

      await apiPatch(app, `/api/rooms/${roomId}`, { title: 'Hijacked' }, guest.token).expect(403);
      await apiDelete(app, `/api/rooms/${roomId}`, guest.token).expect(403);

      const renamed = await apiPatch(app, `/api/rooms/${roomId}`, { title: 'Renamed' }, host.token).expect(200);
      expect(renamed.body.title).toBe('Renamed');

      await apiDelete(app, `/api/rooms/${roomId}`, host.token).expect(204);
      await apiGet(app, `/api/rooms/${roomId}`).expect(404);
    });
  });

  describe('participants', () => {
    it('joins, lists in join order and leaves', async () => {
      const roomId = await openRoom();

      const joined = await apiPost(app, `/api/rooms/${roomId}/participants`, {}, guest.token).expect(201);
      expect(joined.body).toMatchObject({ roomId, userId: guest.userId });
      await apiPost(app, `/api/rooms/${roomId}/participants`, { userId: host.userId }, host.token).expect(201);

      const list = await apiGet(app, `/api/rooms/${roomId}/participants`).expect(200);
      expect(list.body).toEqual([
        {
          userId: guest.userId,
          username: 'gus',
          avatarUrl: 'https://ui-avatars.com/api/?name=gus&background=random',
        },
        {
          userId: host.userId,
          username: 'hannah',
          avatarUrl: 'https://ui-avatars.com/api/?name=hannah&background=random',
        },
      ]);

      await apiDelete(app, `/api/rooms/${roomId}/participants/${guest.userId}`, guest.token).expect(204);
      await apiDelete(app, `/api/rooms/${roomId}/participants/${guest.userId}`, guest.token).expect(404);

      const after = await apiGet(app, `/api/rooms/${roomId}/participants`).expect(200);
      expect(after.body.map((p: { userId: string }) => p.userId)).toEqual([host.userId]);
    });

    it('rejects joining twice with 409', async () => {
      const roomId = await openRoom();
      await apiPost(app, `/api/rooms/${roomId}/participants`, {}, guest.token).expect(201);

      const res = await apiPost(app, `/api/rooms/${roomId}/participants`, {}, guest.token).expect(409);
      expect(res.body.code).toBe('uniqueness');
    });

    it('refuses joining or removing on behalf of someone else', async () => {
      const roomId = await openRoom();

      await apiPost(app, `/api/rooms/${roomId}/participants`, { userId: guest.userId }, host.token).expect(403);
      await apiPost(app, `/api/rooms/${roomId}/participants`, {}, guest.token).expect(201);
      await apiDelete(app, `/api/rooms/${roomId}/participants/${guest.userId}`, host.token).expect(403);
    });

    it('returns 404 when joining an unknown room', async () => {
      await apiPost(app, '/api/rooms/unknown-room/participants', {}, guest.token).expect(404);
    });

    it('returns [] for the participants of an unknown room', async () => {
      const res = await apiGet(app, '/api/rooms/unknown-room/participants').expect(200);
      expect(res.body).toEqual([]);
    });

    it('drops participants when the room is deleted', async () => {
      const roomId = await openRoom();
      await apiPost(app, `/api/rooms/${roomId}/participants`, {}, guest.token).expect(201);

      await apiDelete(app, `/api/rooms/${roomId}`, host.token).expect(204);

      const res = await apiGet(app, `/api/rooms/${roomId}/participants`).expect(200);
      expect(res.body).toEqual([]);
    });
  });
});
