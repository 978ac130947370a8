import { Module } from '@nestjs/common';

import { AuthModule } from '../auth/auth.module';
import { ProvisioningModule } from '../provisioning/provisioning.module';
import { AccountsController } from './accounts.controller';
import { AccountsService } from './accounts.service';

@Module({
  imports: [AuthModule, ProvisioningModule],
  controllers: [AccountsController],
  providers: [AccountsService],
})
export class AccountsModule {}
