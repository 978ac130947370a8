import { IsOptional, IsString } from 'class-validator';

export class UpdateProfileDto {
  @IsOptional()
  @IsString()
  username?: string;

  /** Blank restores the generated placeholder. */
  @IsOptional()
  @IsString()
  avatar_url?: string;
}
