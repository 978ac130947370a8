/**
 * RepositoryModule — dynamic module that provides IAccountStore and IAudioRoomRepository.
 *
 * Selects the persistence backend via the PERSISTENCE_BACKEND environment variable:
 *   - "postgres" (default) → PgAccountStore / PgAudioRoomRepository
 *   - "inmemory"           → InMemoryAccountStore / InMemoryAudioRoomRepository
 *
 * Usage:
 *   imports: [RepositoryModule.register()]
 */
import { Module, type DynamicModule } from '@nestjs/common';
import { ACCOUNT_STORE, AUDIO_ROOM_REPOSITORY } from '../../domain/repositories/repository.tokens';
import { PgAccountStore } from './postgres/pg-account.store';
import { PgAudioRoomRepository } from './postgres/pg-audio-room.repository';
import { InMemoryAccountStore } from './inmemory/inmemory-account.store';
import { InMemoryAudioRoomRepository } from './inmemory/inmemory-audio-room.repository';
import { DatabaseModule } from '../../modules/database/database.module';

export type PersistenceBackend = 'postgres' | 'inmemory';

export function resolvePersistenceBackend(value: string | undefined): PersistenceBackend {
  return (value ?? 'postgres').trim().toLowerCase() === 'inmemory' ? 'inmemory' : 'postgres';
}

@Module({})
export class RepositoryModule {
  static register(): DynamicModule {
    if (resolvePersistenceBackend(process.env.PERSISTENCE_BACKEND) === 'inmemory') {
      return {
        module: RepositoryModule,
        global: true,
        providers: [
          InMemoryAccountStore,
          { provide: ACCOUNT_STORE, useExisting: InMemoryAccountStore },
          { provide: AUDIO_ROOM_REPOSITORY, useClass: InMemoryAudioRoomRepository },
        ],
        exports: [ACCOUNT_STORE, AUDIO_ROOM_REPOSITORY, InMemoryAccountStore],
      };
    }

    return {
      module: RepositoryModule,
      global: true,
      imports: [DatabaseModule],
      providers: [
        { provide: ACCOUNT_STORE, useClass: PgAccountStore },
        { provide: AUDIO_ROOM_REPOSITORY, useClass: PgAudioRoomRepository },
      ],
      exports: [ACCOUNT_STORE, AUDIO_ROOM_REPOSITORY],
    };
  }
}
