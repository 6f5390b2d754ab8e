import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';

import { AppConfigModule } from '@libs/config';

import { AuthService } from './auth.service';
import { ApiTokenGuard } from './guards/api-token.guard';

@Module({
  imports: [AppConfigModule],
  providers: [
    AuthService,
    {
      provide: APP_GUARD,
      useClass: ApiTokenGuard,
    },
  ],
  exports: [AuthService],
})
export class AuthModule {}
