import { Body, Controller, Post } from '@nestjs/common';

import { Public } from '../auth/public.decorator';
import { AccountsService, type SignupResult } from './accounts.service';
import { SignupDto } from './dto/signup.dto';

@Controller('auth')
export class AccountsController {
  constructor(private readonly accountsService: AccountsService) {}

  /**
   * Create an account and provision its profile, balance and welcome rows.
   * POST /auth/signup
   * Body: { email?, metadata: { username, avatar_url? } }
   */
  @Public()
  @Post('signup')
  async signup(@Body() dto: SignupDto): Promise<SignupResult> {
    return this.accountsService.signup(dto);
  }
}
