import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { RaceState } from '@milemark/entities';
import { PersistedRaceState, RaceStateStore } from '@milemark/tracker';

@Injectable()
export class TypeormRaceStateStore implements RaceStateStore {
  constructor(
    @InjectRepository(RaceState)
    private readonly repository: Repository<RaceState>,
  ) {}

  async save(state: PersistedRaceState): Promise<void> {
    await this.repository.save(this.repository.create(state));
  }

  async restore(raceName: string): Promise<PersistedRaceState | null> {
    const row = await this.repository.findOneBy({ raceName });
    if (!row) {
      return null;
    }
    return {
      raceName: row.raceName,
      mileMark: row.mileMark,
      elevation: row.elevation,
      pings: row.pings,
      lowBattery: row.lowBattery,
      trackInterval: row.trackInterval,
      lastPayload: row.lastPayload,
      aidStations: row.aidStations,
    };
  }
}
