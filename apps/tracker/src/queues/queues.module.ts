import { Module } from '@nestjs/common';
import { BullModule } from '@nestjs/bullmq';
import { QUEUE_MARKER_UPDATE } from '@milemark/queue-jobs';
import { CourseModule } from '../course/course.module';
import { MarkerUpdateProcessor } from './marker-update.processor';

@Module({
  imports: [
    BullModule.registerQueue({
      name: QUEUE_MARKER_UPDATE,
      defaultJobOptions: {
        removeOnComplete: 100,
        removeOnFail: 50,
      },
    }),
    CourseModule,
  ],
  providers: [MarkerUpdateProcessor],
  exports: [BullModule],
})
export class QueuesModule {}
