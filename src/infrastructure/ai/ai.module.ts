import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import aiConfig from '@config/ai.config';
import { GroqAiOrchestrationAdapter } from './groq-ai-orchestration.adapter';

@Module({
  imports: [ConfigModule.forFeature(aiConfig)],
  providers: [
    GroqAiOrchestrationAdapter,
    { provide: 'IAiOrchestrationPort', useExisting: GroqAiOrchestrationAdapter },
  ],
  exports: ['IAiOrchestrationPort'],
})
export class AiModule {}
