/**
 * Domain models for audio rooms and their participants.
 */
export interface AudioRoomRecord {
  id: string;
  title: string;
  hostId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface AudioRoomCreateInput {
  title: string;
  hostId: string;
}

export interface AudioRoomUpdateInput {
  title?: string;
}

export interface ParticipantRecord {
  id: string;
  roomId: string;
  userId: string;
  joinedAt: Date;
}

/** Row shape of the participants read API (participant joined with profile). */
export interface RoomParticipantView {
  userId: string;
  username: string;
  avatarUrl: string;
}
