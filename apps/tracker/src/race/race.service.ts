import { Inject, Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { raceConfig, RaceConfig } from '@milemark/config';
import { MARKER_UPDATER, MarkerUpdater } from '@milemark/mapping';
import { CheckInOutcome, InreachPayload, Race } from '@milemark/tracker';
import { LOADED_COURSE, LoadedCourse } from '../course/course.loader';
import { presentCourse, presentRaceStatus } from './race-status';
import { QueueMarkerDispatcher } from './queue-marker.dispatcher';
import { TypeormRaceStateStore } from './typeorm-race-state.store';

@Injectable()
export class RaceService implements OnApplicationBootstrap {
  private readonly logger = new Logger(RaceService.name);
  readonly race: Race;

  constructor(
    @Inject(raceConfig.KEY)
    private readonly config: RaceConfig,
    @Inject(LOADED_COURSE)
    private readonly loaded: LoadedCourse,
    store: TypeormRaceStateStore,
    dispatcher: QueueMarkerDispatcher,
    @Inject(MARKER_UPDATER)
    markerUpdater: MarkerUpdater | null,
  ) {
    this.race = new Race({
      name: config.raceName,
      startTime: new Date(config.startTime),
      course: loaded.course,
      minPlausiblePace: config.minPlausiblePace,
      store,
      markers: markerUpdater ? dispatcher : null,
      logger: new Logger(Race.name),
    });
  }

  async onApplicationBootstrap(): Promise<void> {
    const restored = await this.race.restoreFromStore();
    if (!restored) {
      this.logger.log(`No saved state for ${this.race.name}, starting fresh`);
    }
  }

  ingest(payload: InreachPayload): CheckInOutcome {
    return this.race.ingestFix(payload);
  }

  status() {
    return presentRaceStatus(this.race, this.config.runnerName, this.config.timezone);
  }

  courseView() {
    return presentCourse(this.race.course, this.loaded.mapUrl);
  }
}
