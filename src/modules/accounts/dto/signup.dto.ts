import { IsEmail, IsObject, IsOptional } from 'class-validator';

/**
 * POST /auth/signup body.
 *
 * `metadata.username` and `metadata.avatar_url` are validated by the
 * provisioning workflow, not here, so the error detail is the same whichever
 * path creates the account.
 */
export class SignupDto {
  @IsOptional()
  @IsEmail()
  email?: string;

  @IsObject()
  metadata!: Record<string, unknown>;
}
