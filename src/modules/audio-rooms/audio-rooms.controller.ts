import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  Param,
  Patch,
  Post
} from '@nestjs/common';

import { Public } from '../auth/public.decorator';
import { CurrentUserId } from '../auth/current-user.decorator';
import type {
  AudioRoomRecord,
  ParticipantRecord,
  RoomParticipantView,
} from '../../domain/models/audio-room.model';
import { AudioRoomsService } from './audio-rooms.service';
import { RoomTitleDto } from './dto/room-title.dto';
import { JoinRoomDto } from './dto/join-room.dto';

@Controller('rooms')
export class AudioRoomsController {
  constructor(private readonly roomsService: AudioRoomsService) {}

  /**
   * Open a room hosted by the caller
   * POST /rooms
   * Body: { title }
   */
  @Post()
  async createRoom(@CurrentUserId() actorId: string, @Body() dto: RoomTitleDto): Promise<AudioRoomRecord> {
    return this.roomsService.createRoom(actorId, dto.title);
  }

  /** GET /rooms (newest first) */
  @Public()
  @Get()
  async listRooms(): Promise<AudioRoomRecord[]> {
    return this.roomsService.listRooms();
  }

  @Public()
  @Get(':id')
  async getRoom(@Param('id') id: string): Promise<AudioRoomRecord> {
    return this.roomsService.getRoom(id);
  }

  @Patch(':id')
  async updateRoom(
    @CurrentUserId() actorId: string,
    @Param('id') id: string,
    @Body() dto: RoomTitleDto
  ): Promise<AudioRoomRecord> {
    return this.roomsService.updateRoom(actorId, id, dto.title);
  }

  @Delete(':id')
  @HttpCode(204)
  async deleteRoom(@CurrentUserId() actorId: string, @Param('id') id: string): Promise<void> {
    await this.roomsService.deleteRoom(actorId, id);
  }

  /**
   * Participants with username and avatar, in join order
   * GET /rooms/{id}/participants
   */
  @Public()
  @Get(':id/participants')
  async listParticipants(@Param('id') id: string): Promise<RoomParticipantView[]> {
    return this.roomsService.listParticipants(id);
  }

  /**
   * Join a room
   * POST /rooms/{id}/participants
   * Body: { userId? } (defaults to the caller)
   */
  @Post(':id/participants')
  async joinRoom(
    @CurrentUserId() actorId: string,
    @Param('id') id: string,
    @Body() dto: JoinRoomDto
  ): Promise<ParticipantRecord> {
    return this.roomsService.joinRoom(actorId, id, dto.userId);
  }

  @Delete(':id/participants/:userId')
  @HttpCode(204)
  async leaveRoom(
    @CurrentUserId() actorId: string,
    @Param('id') id: string,
    @Param('userId') userId: string
  ): Promise<void> {
    await this.roomsService.leaveRoom(actorId, id, userId);
  }
}
