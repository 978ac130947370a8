import { IsString } from 'class-validator';

/** Body of POST /rooms and PATCH /rooms/:id. Length is checked after trimming, in the service. */
export class RoomTitleDto {
  @IsString()
  title!: string;
}
