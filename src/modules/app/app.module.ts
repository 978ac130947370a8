import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { ConfigModule } from '@nestjs/config';

import { AccountsModule } from '../accounts/accounts.module';
import { AudioRoomsModule } from '../audio-rooms/audio-rooms.module';
import { AuthModule } from '../auth/auth.module';
import { LoggingModule } from '../logging/logging.module';
import { ProfilesModule } from '../profiles/profiles.module';
import { RepositoryModule } from '../../infrastructure/repositories/repository.module';
import { ApiExceptionFilter } from '../../common/filters/api-exception.filter';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true }),
    LoggingModule,
    RepositoryModule.register(),
    AuthModule,
    AccountsModule,
    ProfilesModule,
    AudioRoomsModule
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: ApiExceptionFilter
    }
  ]
})
export class AppModule {}
