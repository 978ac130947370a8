/**
 * IAudioRoomRepository — persistence port for audio rooms and participants.
 *
 * Implementations:
 *   - PgAudioRoomRepository       (PostgreSQL via pg)
 *   - InMemoryAudioRoomRepository (testing / lightweight deployments)
 */
import type {
  AudioRoomCreateInput,
  AudioRoomRecord,
  AudioRoomUpdateInput,
  ParticipantRecord,
  RoomParticipantView,
} from '../models/audio-room.model';

export interface IAudioRoomRepository {
  create(input: AudioRoomCreateInput): Promise<AudioRoomRecord>;

  findById(roomId: string): Promise<AudioRoomRecord | null>;

  /** All rooms, newest first. */
  findAll(): Promise<AudioRoomRecord[]>;

  update(roomId: string, data: AudioRoomUpdateInput): Promise<AudioRoomRecord>;

  /** Delete a room; its participants go with it. */
  delete(roomId: string): Promise<void>;

  /** Throws `UniquenessRaceError` when the user is already in the room. */
  addParticipant(roomId: string, userId: string): Promise<ParticipantRecord>;

  /** @returns `false` when the user was not in the room. */
  removeParticipant(roomId: string, userId: string): Promise<boolean>;

  /** Participants joined with their profiles, in join order. */
  findParticipants(roomId: string): Promise<RoomParticipantView[]>;
}
