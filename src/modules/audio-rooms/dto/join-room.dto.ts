import { IsOptional, IsString } from 'class-validator';

export class JoinRoomDto {
  /** Defaults to the caller; any other user is refused. */
  @IsOptional()
  @IsString()
  userId?: string;
}
