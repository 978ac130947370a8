import { Module } from '@nestjs/common';

import { MeController } from './me.controller';
import { ProfilesController } from './profiles.controller';
import { ProfilesService } from './profiles.service';

@Module({
  controllers: [ProfilesController, MeController],
  providers: [ProfilesService],
})
export class ProfilesModule {}
