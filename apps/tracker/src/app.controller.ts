import { Controller, Get } from '@nestjs/common';
import { RaceService } from './race/race.service';

@Controller()
export class AppController {
  constructor(private readonly raceService: RaceService) {}

  @Get()
  health() {
    const { runner } = this.raceService.race;
    return {
      status: 'ok',
      race: this.raceService.race.name,
      pings: runner.pings,
      lastFix: runner.lastFix?.timestamp.toISOString() ?? null,
      timestamp: new Date().toISOString(),
    };
  }
}
