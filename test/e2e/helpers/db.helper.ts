import type { INestApplication } from '@nestjs/common';

import { AUDIO_ROOM_REPOSITORY } from '@app/domain/repositories/repository.tokens';
import { InMemoryAccountStore } from '@app/infrastructure/repositories/inmemory/inmemory-account.store';
import { InMemoryAudioRoomRepository } from '@app/infrastructure/repositories/inmemory/inmemory-audio-room.repository';

/**
 * Empties the in-memory stores behind the e2e app.
 * Call this in `beforeEach()` to ensure full test isolation.
 */
export function resetDatabase(app: INestApplication): void {
  app.get(InMemoryAccountStore).clear();

  const rooms: unknown = app.get(AUDIO_ROOM_REPOSITORY);
  if (rooms instanceof InMemoryAudioRoomRepository) {
    rooms.clear();
  }
}

export function accountStore(app: INestApplication): InMemoryAccountStore {
  return app.get(InMemoryAccountStore);
}
