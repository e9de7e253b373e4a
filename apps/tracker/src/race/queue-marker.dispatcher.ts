import { Injectable } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { QUEUE_MARKER_UPDATE, type MarkerUpdateJobData } from '@milemark/queue-jobs';
import { MarkerUpdate, MarkerUpdateDispatcher } from '@milemark/tracker';

@Injectable()
export class QueueMarkerDispatcher implements MarkerUpdateDispatcher {
  constructor(
    @InjectQueue(QUEUE_MARKER_UPDATE)
    private readonly markerUpdateQueue: Queue<MarkerUpdateJobData>,
  ) {}

  async dispatch(update: MarkerUpdate): Promise<void> {
    const data: MarkerUpdateJobData = {
      raceName: update.raceName,
      runner: update.runner,
      estimate: update.estimate,
      heading: update.heading,
      fixTimestamp: update.timestamp.toISOString(),
    };
    await this.markerUpdateQueue.add('update', data, {
      attempts: 3,
      backoff: { type: 'exponential', delay: 2000 },
    });
  }
}
