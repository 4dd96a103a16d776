import { Module, ValidationPipe } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER, APP_PIPE } from '@nestjs/core';

import {
  EnvelopeExceptionFilter,
} from './common/errors/envelope-exception.filter';
import { aidraConfig } from './config/aidra.config';
import { validateEnv } from './config/env.validation';
import { AnalysisModule } from './features/analysis/analysis.module';
import { ContactsModule } from './features/contacts/contacts.module';
import { HealthModule } from './features/health/health.module';
import { SessionsModule } from './features/sessions/sessions.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      validate: validateEnv,
      load: [aidraConfig],
    }),
    AnalysisModule,
    SessionsModule,
    ContactsModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_FILTER, useClass: EnvelopeExceptionFilter },
    {
      provide: APP_PIPE,
      useValue: new ValidationPipe({ transform: true, whitelist: true }),
    },
  ],
})
export class AppModule {}
