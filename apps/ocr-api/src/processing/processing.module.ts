import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { JobsModule } from '@ocr-gateway/jobs';
import { PipelineModule } from '@ocr-gateway/pipeline';
import { WorkspaceModule } from '../workspace/workspace.module';
import { JobProcessorService } from './job-processor.service';
import { JobDispatcherService } from './job-dispatcher.service';

@Module({
  imports: [ConfigModule, JobsModule, WorkspaceModule, PipelineModule.forRoot()],
  providers: [JobProcessorService, JobDispatcherService],
  exports: [JobDispatcherService],
})
export class ProcessingModule {}
