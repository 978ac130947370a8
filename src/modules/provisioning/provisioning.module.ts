import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { PROVISIONING_OPTIONS, loadProvisioningOptions } from './provisioning.config';
import { UserProvisioningService } from './user-provisioning.service';

@Module({
  providers: [
    {
      provide: PROVISIONING_OPTIONS,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => loadProvisioningOptions(config),
    },
    UserProvisioningService,
  ],
  exports: [UserProvisioningService],
})
export class ProvisioningModule {}
