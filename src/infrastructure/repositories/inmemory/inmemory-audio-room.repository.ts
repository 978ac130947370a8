/**
 * InMemoryAudioRoomRepository — IAudioRoomRepository backed by in-memory Maps.
 *
 * Participant views are joined against InMemoryAccountStore profiles, so both
 * in-memory adapters must be registered together (RepositoryModule does this).
 */
import { Injectable } from '@nestjs/common';
import { randomUUID } from 'node:crypto';
import type { IAudioRoomRepository } from '../../../domain/repositories/audio-room.repository.interface';
import type {
  AudioRoomCreateInput,
  AudioRoomRecord,
  AudioRoomUpdateInput,
  ParticipantRecord,
  RoomParticipantView,
} from '../../../domain/models/audio-room.model';
import { UniquenessRaceError } from '../../../domain/errors/domain.errors';
import { PARTICIPANTS_ROOM_USER_KEY } from '../../../domain/repositories/constraint-names';
import { InMemoryAccountStore } from './inmemory-account.store';

@Injectable()
export class InMemoryAudioRoomRepository implements IAudioRoomRepository {
  private readonly rooms: Map<string, AudioRoomRecord> = new Map();
  private readonly participants: ParticipantRecord[] = [];
  /** Insertion sequence, used to break createdAt ties. */
  private readonly sequence = new Map<string, number>();
  private nextSequence = 0;

  constructor(private readonly accounts: InMemoryAccountStore) {}

  async create(input: AudioRoomCreateInput): Promise<AudioRoomRecord> {
    const now = new Date();
    const record: AudioRoomRecord = {
      id: randomUUID(),
      title: input.title,
      hostId: input.hostId,
      createdAt: now,
      updatedAt: now,
    };
    this.rooms.set(record.id, record);
    this.sequence.set(record.id, this.nextSequence++);
    return { ...record };
  }

  async findById(roomId: string): Promise<AudioRoomRecord | null> {
    const room = this.rooms.get(roomId);
    return room ? { ...room } : null;
  }

  async findAll(): Promise<AudioRoomRecord[]> {
    return Array.from(this.rooms.values())
      .sort(
        (a, b) =>
          b.createdAt.getTime() - a.createdAt.getTime() ||
          (this.sequence.get(b.id) ?? 0) - (this.sequence.get(a.id) ?? 0),
      )
      .map((r) => ({ ...r }));
  }

  async update(roomId: string, data: AudioRoomUpdateInput): Promise<AudioRoomRecord> {
    const existing = this.rooms.get(roomId);
    if (!existing) {
      throw new Error(`Audio room with id ${roomId} not found`);
    }
    const updated: AudioRoomRecord = {
      ...existing,
      ...(data.title !== undefined ? { title: data.title } : {}),
      updatedAt: new Date(),
    };
    this.rooms.set(roomId, updated);
    return { ...updated };
  }

  async delete(roomId: string): Promise<void> {
    this.rooms.delete(roomId);
    this.sequence.delete(roomId);
    for (let i = this.participants.length - 1; i >= 0; i--) {
      if (this.participants[i].roomId === roomId) this.participants.splice(i, 1);
    }
  }

  async addParticipant(roomId: string, userId: string): Promise<ParticipantRecord> {
    if (this.participants.some((p) => p.roomId === roomId && p.userId === userId)) {
      throw new UniquenessRaceError(PARTICIPANTS_ROOM_USER_KEY);
    }
    const record: ParticipantRecord = { id: randomUUID(), roomId, userId, joinedAt: new Date() };
    this.participants.push(record);
    return { ...record };
  }

  async removeParticipant(roomId: string, userId: string): Promise<boolean> {
    const index = this.participants.findIndex((p) => p.roomId === roomId && p.userId === userId);
    if (index === -1) return false;
    this.participants.splice(index, 1);
    return true;
  }

  async findParticipants(roomId: string): Promise<RoomParticipantView[]> {
    const views: RoomParticipantView[] = [];
    for (const participant of this.participants) {
      if (participant.roomId !== roomId) continue;
      const profile = await this.accounts.findProfileById(participant.userId);
      if (!profile) continue;
      views.push({ userId: participant.userId, username: profile.username, avatarUrl: profile.avatarUrl });
    }
    return views;
  }

  /** Clear all data — useful in test teardowns. */
  clear(): void {
    this.rooms.clear();
    this.participants.length = 0;
    this.sequence.clear();
  }
}
