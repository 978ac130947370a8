/**
 * AudioRoomsService — rooms and their participants.
 *
 * Access rules:
 *   rooms         read: anyone   create: actor becomes host   update/delete: host only
 *   participants  read: anyone   join/leave: only as yourself
 */
import { Inject, Injectable } from '@nestjs/common';

import { AUDIO_ROOM_REPOSITORY } from '../../domain/repositories/repository.tokens';
import type { IAudioRoomRepository } from '../../domain/repositories/audio-room.repository.interface';
import type {
  AudioRoomRecord,
  ParticipantRecord,
  RoomParticipantView,
} from '../../domain/models/audio-room.model';
import {
  ConflictError,
  ForbiddenError,
  NotFoundError,
  UniquenessRaceError,
  ValidationError,
} from '../../domain/errors/domain.errors';
import { AppLogger } from '../logging/app-logger.service';
import { LogCategory } from '../logging/log-levels';

export const MAX_TITLE_LENGTH = 120;

export function normalizeTitle(raw: string): string {
  const title = raw.trim();
  if (title.length === 0 || title.length > MAX_TITLE_LENGTH) {
    throw new ValidationError(`title must be between 1 and ${MAX_TITLE_LENGTH} characters`);
  }
  return title;
}

@Injectable()
export class AudioRoomsService {
  constructor(
    @Inject(AUDIO_ROOM_REPOSITORY) private readonly rooms: IAudioRoomRepository,
    private readonly logger: AppLogger,
  ) {}

  async createRoom(actorId: string, rawTitle: string): Promise<AudioRoomRecord> {
    const room = await this.rooms.create({ title: normalizeTitle(rawTitle), hostId: actorId });
    this.logger.info(LogCategory.AUDIO_ROOM, 'Room created', { roomId: room.id, hostId: actorId });
    return room;
  }

  async listRooms(): Promise<AudioRoomRecord[]> {
    return this.rooms.findAll();
  }

  async getRoom(roomId: string): Promise<AudioRoomRecord> {
    const room = await this.rooms.findById(roomId);
    if (!room) {
      throw new NotFoundError(`Room ${roomId} not found`);
    }
    return room;
  }

  async updateRoom(actorId: string, roomId: string, rawTitle: string): Promise<AudioRoomRecord> {
    const title = normalizeTitle(rawTitle);
    await this.requireHost(actorId, roomId, 'update');
    const updated = await this.rooms.update(roomId, { title });
    this.logger.info(LogCategory.AUDIO_ROOM, 'Room updated', { roomId });
    return updated;
  }

  async deleteRoom(actorId: string, roomId: string): Promise<void> {
    await this.requireHost(actorId, roomId, 'delete');
    await this.rooms.delete(roomId);
    this.logger.info(LogCategory.AUDIO_ROOM, 'Room deleted', { roomId });
  }

  async joinRoom(actorId: string, roomId: string, userId: string = actorId): Promise<ParticipantRecord> {
    if (userId !== actorId) {
      throw new ForbiddenError('You can only join a room as yourself');
    }
    await this.getRoom(roomId);

    try {
      const participant = await this.rooms.addParticipant(roomId, userId);
      this.logger.info(LogCategory.AUDIO_ROOM, 'Participant joined', { roomId, userId });
      return participant;
    } catch (error) {
      if (error instanceof UniquenessRaceError) {
        throw new ConflictError('already a participant of this room', { cause: error });
      }
      throw error;
    }
  }

  async leaveRoom(actorId: string, roomId: string, userId: string): Promise<void> {
    if (userId !== actorId) {
      throw new ForbiddenError('You can only leave a room as yourself');
    }
    const removed = await this.rooms.removeParticipant(roomId, userId);
    if (!removed) {
      throw new NotFoundError(`User ${userId} is not a participant of room ${roomId}`);
    }
    this.logger.info(LogCategory.AUDIO_ROOM, 'Participant left', { roomId, userId });
  }

  /** Participants with their profile fields, in join order. Unknown rooms yield []. */
  async listParticipants(roomId: string): Promise<RoomParticipantView[]> {
    return this.rooms.findParticipants(roomId);
  }

  private async requireHost(actorId: string, roomId: string, action: 'update' | 'delete'): Promise<void> {
    const room = await this.getRoom(roomId);
    if (room.hostId !== actorId) {
      this.logger.warn(LogCategory.AUDIO_ROOM, `Room ${action} denied`, { roomId, actorId });
      throw new ForbiddenError(`Only the host may ${action} this room`);
    }
  }
}
