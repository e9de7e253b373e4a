import { Processor, WorkerHost } from '@nestjs/bullmq';
import { Inject, Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { raceConfig, RaceConfig } from '@milemark/config';
import { GeoPoint } from '@milemark/geo';
import { MapMarker, MARKER_UPDATER, MarkerUpdater } from '@milemark/mapping';
import { QUEUE_MARKER_UPDATE, type MarkerUpdateJobData } from '@milemark/queue-jobs';
import { LOADED_COURSE, LoadedCourse } from '../course/course.loader';

/** CalTopo styling for markers the tracker has to create itself */
export const RUNNER_MARKER_STYLE: Record<string, unknown> = {
  'marker-size': '1',
  'marker-symbol': 'a:4',
  'marker-color': 'A200FF',
};

export const ESTIMATE_MARKER_STYLE: Record<string, unknown> = {
  'marker-size': '0.5',
  'marker-symbol': 'point',
  'marker-color': 'FFFFFF',
};

export const estimateMarkerTitle = (runnerName: string): string => `${runnerName} (estimated)`;

@Processor(QUEUE_MARKER_UPDATE)
export class MarkerUpdateProcessor extends WorkerHost {
  private readonly logger = new Logger(MarkerUpdateProcessor.name);
  /** Markers by title, as last stored on the map */
  private readonly markers = new Map<string, MapMarker>();

  constructor(
    @Inject(MARKER_UPDATER)
    private readonly markerUpdater: MarkerUpdater | null,
    @Inject(LOADED_COURSE)
    loaded: LoadedCourse,
    @Inject(raceConfig.KEY)
    private readonly config: RaceConfig,
  ) {
    super();
    for (const marker of loaded.markers) {
      this.markers.set(marker.title, marker);
    }
  }

  async process(job: Job<MarkerUpdateJobData>): Promise<void> {
    try {
      await this.applyUpdate(job.data);
    } catch (error) {
      this.logger.error(`Marker update for fix at ${job.data.fixTimestamp} failed`, error);
      throw error;
    }
  }

  /** Moves the runner marker to the reported position and the estimate marker to the route */
  async applyUpdate(data: MarkerUpdateJobData): Promise<void> {
    const updater = this.markerUpdater;
    if (!updater) {
      this.logger.warn('Marker updates are disabled; dropping job');
      return;
    }

    const runnerName = this.config.runnerName;
    await this.moveMarker(updater, runnerName, data.runner, data.heading, RUNNER_MARKER_STYLE);
    await this.moveMarker(
      updater,
      estimateMarkerTitle(runnerName),
      data.estimate,
      data.heading,
      ESTIMATE_MARKER_STYLE,
    );
    this.logger.debug(`Markers moved for fix at ${data.fixTimestamp}`);
  }

  private async moveMarker(
    updater: MarkerUpdater,
    title: string,
    position: GeoPoint,
    heading: number,
    style: Record<string, unknown>,
  ): Promise<void> {
    const existing = this.markers.get(title);
    if (!existing) {
      this.logger.log(`Creating marker "${title}"`);
    }
    const saved = await updater.saveMarker({
      id: existing?.id ?? null,
      title,
      lat: position.lat,
      lon: position.lon,
      properties: { ...(existing?.properties ?? style), 'marker-rotation': heading },
    });
    this.markers.set(title, saved);
  }
}
