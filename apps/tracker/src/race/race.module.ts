import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { BullModule } from '@nestjs/bullmq';
import { RaceState } from '@milemark/entities';
import { QUEUE_MARKER_UPDATE } from '@milemark/queue-jobs';
import { CourseModule } from '../course/course.module';
import { QueueMarkerDispatcher } from './queue-marker.dispatcher';
import { RaceController } from './race.controller';
import { RaceService } from './race.service';
import { TypeormRaceStateStore } from './typeorm-race-state.store';

@Module({
  imports: [
    TypeOrmModule.forFeature([RaceState]),
    BullModule.registerQueue({ name: QUEUE_MARKER_UPDATE }),
    CourseModule,
  ],
  controllers: [RaceController],
  providers: [RaceService, TypeormRaceStateStore, QueueMarkerDispatcher],
  exports: [RaceService],
})
export class RaceModule {}
