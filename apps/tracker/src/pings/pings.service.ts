import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Ping } from '@milemark/entities';
import { CheckInOutcome, InreachPayload } from '@milemark/tracker';
import { RaceService } from '../race/race.service';

export const DEFAULT_PING_LIMIT = 50;

@Injectable()
export class PingsService {
  private readonly logger = new Logger(PingsService.name);

  constructor(
    private readonly raceService: RaceService,
    @InjectRepository(Ping)
    private readonly pingRepository: Repository<Ping>,
  ) {}

  /** Runs the payload through the race, then logs it with the outcome */
  async receive(payload: InreachPayload): Promise<{ ping: Ping; outcome: CheckInOutcome }> {
    const outcome = this.raceService.ingest(payload);
    const ping = await this.pingRepository.save(
      this.pingRepository.create({
        raceName: this.raceService.race.name,
        payload,
        outcome,
        mileMark: outcome === 'accepted' ? this.raceService.race.runner.mileMark : null,
      }),
    );
    this.logger.log(`Ping ${ping.id}: ${outcome}`);
    return { ping, outcome };
  }

  async findRecent(limit = DEFAULT_PING_LIMIT): Promise<Ping[]> {
    return this.pingRepository.find({
      where: { raceName: this.raceService.race.name },
      order: { receivedAt: 'DESC' },
      take: limit,
    });
  }

  async findById(id: string): Promise<Ping> {
    return this.pingRepository.findOneByOrFail({ id });
  }
}
