/**
 * PgAudioRoomRepository — IAudioRoomRepository backed by PostgreSQL.
 *
 * Participant rows cascade from audio_rooms, so `delete` is a single
 * statement. `findParticipants` is the get_room_participants join.
 */
import { Injectable } from '@nestjs/common';
import { DatabaseService } from '../../../modules/database/database.service';
import type { IAudioRoomRepository } from '../../../domain/repositories/audio-room.repository.interface';
import type {
  AudioRoomCreateInput,
  AudioRoomRecord,
  AudioRoomUpdateInput,
  ParticipantRecord,
  RoomParticipantView,
} from '../../../domain/models/audio-room.model';
import { translatePgError } from './pg-errors';
import { isValidUuid } from './uuid-guard';

type RoomRow = {
  id: string;
  title: string;
  host_id: string;
  created_at: Date;
  updated_at: Date;
};

type ParticipantRow = {
  id: string;
  room_id: string;
  user_id: string;
  joined_at: Date;
};

type ParticipantViewRow = {
  user_id: string;
  username: string;
  avatar_url: string;
};

const ROOM_COLUMNS = 'id, title, host_id, created_at, updated_at';

export const ROOM_SQL = {
  create: `INSERT INTO audio_rooms (title, host_id) VALUES ($1, $2) RETURNING ${ROOM_COLUMNS}`,
  findById: `SELECT ${ROOM_COLUMNS} FROM audio_rooms WHERE id = $1`,
  findAll: `SELECT ${ROOM_COLUMNS} FROM audio_rooms ORDER BY created_at DESC`,
  update: `UPDATE audio_rooms SET title = COALESCE($2, title), updated_at = now()
    WHERE id = $1 RETURNING ${ROOM_COLUMNS}`,
  delete: 'DELETE FROM audio_rooms WHERE id = $1',
  addParticipant: `INSERT INTO audio_room_participants (room_id, user_id) VALUES ($1, $2)
    RETURNING id, room_id, user_id, joined_at`,
  removeParticipant: 'DELETE FROM audio_room_participants WHERE room_id = $1 AND user_id = $2',
  findParticipants: `SELECT p.user_id, profiles.username, profiles.avatar_url
    FROM audio_room_participants p
    JOIN profiles ON p.user_id = profiles.id
    WHERE p.room_id = $1
    ORDER BY p.joined_at ASC`,
} as const;

function toRoom(row: RoomRow): AudioRoomRecord {
  return {
    id: row.id,
    title: row.title,
    hostId: row.host_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

@Injectable()
export class PgAudioRoomRepository implements IAudioRoomRepository {
  constructor(private readonly db: DatabaseService) {}

  async create(input: AudioRoomCreateInput): Promise<AudioRoomRecord> {
    const result = await this.db.pool.query<RoomRow>(ROOM_SQL.create, [input.title, input.hostId]);
    return toRoom(result.rows[0]);
  }

  async findById(roomId: string): Promise<AudioRoomRecord | null> {
    if (!isValidUuid(roomId)) return null;
    const result = await this.db.pool.query<RoomRow>(ROOM_SQL.findById, [roomId]);
    return result.rows.length > 0 ? toRoom(result.rows[0]) : null;
  }

  async findAll(): Promise<AudioRoomRecord[]> {
    const result = await this.db.pool.query<RoomRow>(ROOM_SQL.findAll);
    return result.rows.map(toRoom);
  }

  async update(roomId: string, data: AudioRoomUpdateInput): Promise<AudioRoomRecord> {
    const result = await this.db.pool.query<RoomRow>(ROOM_SQL.update, [roomId, data.title ?? null]);
    if (result.rows.length === 0) {
      throw new Error(`Audio room with id ${roomId} not found`);
    }
    return toRoom(result.rows[0]);
  }

  async delete(roomId: string): Promise<void> {
    await this.db.pool.query(ROOM_SQL.delete, [roomId]);
  }

  async addParticipant(roomId: string, userId: string): Promise<ParticipantRecord> {
    try {
      const result = await this.db.pool.query<ParticipantRow>(ROOM_SQL.addParticipant, [roomId, userId]);
      const row = result.rows[0];
      return { id: row.id, roomId: row.room_id, userId: row.user_id, joinedAt: row.joined_at };
    } catch (error) {
      throw translatePgError(error);
    }
  }

  async removeParticipant(roomId: string, userId: string): Promise<boolean> {
    if (!isValidUuid(roomId) || !isValidUuid(userId)) return false;
    const result = await this.db.pool.query(ROOM_SQL.removeParticipant, [roomId, userId]);
    return (result.rowCount ?? 0) > 0;
  }

  async findParticipants(roomId: string): Promise<RoomParticipantView[]> {
    if (!isValidUuid(roomId)) return [];
    const result = await this.db.pool.query<ParticipantViewRow>(ROOM_SQL.findParticipants, [roomId]);
    return result.rows.map((row) => ({
      userId: row.user_id,
      username: row.username,
      avatarUrl: row.avatar_url,
    }));
  }
}
