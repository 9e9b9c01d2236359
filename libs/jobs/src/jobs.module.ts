import { Module } from '@nestjs/common';
import { JobRegistry } from './job-registry';

/**
 * Provides the single JobRegistry instance.
 *
 * Import it wherever jobs are created, processed or queried; Nest hands
 * every importer the same registry.
 */
@Module({
  providers: [JobRegistry],
  exports: [JobRegistry],
})
export class JobsModule {}
