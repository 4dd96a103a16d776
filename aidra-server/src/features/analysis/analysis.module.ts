import { Module } from '@nestjs/common';
import { MulterModule } from '@nestjs/platform-express';

import { aidraConfig, AidraConfig } from '../../config/aidra.config';
import { AgentsModule } from '../agents/agents.module';
import { ContactsModule } from '../contacts/contacts.module';
import { SessionsModule } from '../sessions/sessions.module';
import { AnalysisController } from './analysis.controller';
import { AnalysisOrchestrator } from './analysis.orchestrator';

@Module({
  imports: [
    AgentsModule,
    ContactsModule,
    SessionsModule,
    // Memory storage; the image agent checks size and type again before any
    // model call.
    MulterModule.registerAsync({
      inject: [aidraConfig.KEY],
      useFactory: (config: AidraConfig) => ({
        limits: { fileSize: config.maxImageBytes, files: 1 },
      }),
    }),
  ],
  controllers: [AnalysisController],
  providers: [AnalysisOrchestrator],
})
export class AnalysisModule {}
