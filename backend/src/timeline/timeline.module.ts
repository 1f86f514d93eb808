import { Module } from '@nestjs/common';
import { TimelineController } from './timeline.controller';
import { TimelineLibraryService } from './timeline-library.service';

@Module({
  controllers: [TimelineController],
  providers: [TimelineLibraryService],
  exports: [TimelineLibraryService],
})
export class TimelineModule {}
