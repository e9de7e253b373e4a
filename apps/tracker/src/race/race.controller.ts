import { Controller, Get } from '@nestjs/common';
import { RaceService } from './race.service';

@Controller('race')
export class RaceController {
  constructor(private readonly raceService: RaceService) {}

  @Get()
  status() {
    return this.raceService.status();
  }

  @Get('course')
  course() {
    return this.raceService.courseView();
  }
}
